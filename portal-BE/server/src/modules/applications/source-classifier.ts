import type { ApplicationSource } from '@apply-portal/shared'

/**
 * Labels a submission as scripted when its User-Agent mentions python or
 * requests. Analytics only; the header is client supplied.
 */
export function classifySource(userAgent: string | undefined): ApplicationSource {
  const agent = (userAgent ?? '').toLowerCase()
  return agent.includes('python') || agent.includes('requests') ? 'bot' : 'direct'
}
