import type { ApplicationRecord, FlashMessage, PreservedParams } from '@apply-portal/shared'
import { escapeHtml } from '../../utils/html'
import { buildRedirectUrl } from '../params/param-preserver'

export interface PageContext {
  /** Carried onto every internal link and the form action */
  queryParams: PreservedParams
  flashes: FlashMessage[]
}

const link = (ctx: PageContext, path: string, label: string) =>
  `<a href="${escapeHtml(buildRedirectUrl(path, ctx.queryParams))}">${escapeHtml(label)}</a>`

function flashList(flashes: FlashMessage[]): string {
  if (!flashes.length) return ''
  const items = flashes
    .map((flash) => `<li class="flash flash-${escapeHtml(flash.category)}">${escapeHtml(flash.message)}</li>`)
    .join('')
  return `<ul class="flashes">${items}</ul>`
}

function layout(ctx: PageContext, title: string, body: string): string {
  return `<!doctype html>
<html lang="en">
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1">
  <title>${escapeHtml(title)}</title>
  <style>
    body { font-family: system-ui, sans-serif; max-width: 760px; margin: 2rem auto; padding: 0 1rem; color: #1f2933; }
    label { display: block; margin-top: .75rem; font-weight: 600; }
    input, textarea { width: 100%; padding: .4rem; box-sizing: border-box; }
    .flash-error { color: #b42318; }
    .flash-success { color: #067647; }
    table { border-collapse: collapse; width: 100%; }
    th, td { border: 1px solid #d0d5dd; padding: .35rem; text-align: left; font-size: .9rem; }
    footer { margin-top: 2rem; font-size: .85rem; }
    footer a { margin-right: .75rem; }
  </style>
</head>
<body>
  <h1>${escapeHtml(title)}</h1>
  ${flashList(ctx.flashes)}
  ${body}
  <footer>
    ${link(ctx, '/', 'Apply')}
    ${link(ctx, '/terms/data-collection', 'Data collection')}
    ${link(ctx, '/terms/communication', 'Communication')}
    ${link(ctx, '/terms/recruitment', 'Recruitment')}
    ${link(ctx, '/privacy', 'Privacy')}
  </footer>
</body>
</html>`
}

const textInput = (name: string, label: string, options: { type?: string; required?: boolean } = {}) => `
    <label for="${name}">${escapeHtml(label)}${options.required ? ' *' : ''}</label>
    <input id="${name}" name="${name}" type="${options.type ?? 'text'}"${options.required ? ' required' : ''}>`

export function renderApplicationForm(ctx: PageContext): string {
  const action = buildRedirectUrl('/', ctx.queryParams)
  const body = `
  <form method="post" action="${escapeHtml(action)}" enctype="multipart/form-data">
    ${textInput('first_name', 'First name', { required: true })}
    ${textInput('last_name', 'Last name', { required: true })}
    ${textInput('email', 'Email', { type: 'email', required: true })}
    ${textInput('phone', 'Phone', { type: 'tel' })}
    ${textInput('country', 'Country')}
    ${textInput('city', 'City')}
    ${textInput('address', 'Address')}
    ${textInput('position', 'Position')}
    <label for="additional_info">Additional information</label>
    <textarea id="additional_info" name="additional_info" rows="5"></textarea>
    <label for="resume">Resume</label>
    <input id="resume" name="resume" type="file">
    <p>By applying you accept the ${link(ctx, '/terms/data-collection', 'data collection terms')}.</p>
    <button type="submit">Submit application</button>
  </form>`
  return layout(ctx, 'Apply now', body)
}

export type InfoPageKey = 'data-collection' | 'communication' | 'recruitment' | 'privacy' | 'submit'

const INFO_PAGES: Record<InfoPageKey, { title: string; paragraphs: string[] }> = {
  'data-collection': {
    title: 'Data collection terms',
    paragraphs: [
      'We collect the details you enter in the application form and the resume you upload.',
      'Your network address and browser identification are recorded with each submission.'
    ]
  },
  communication: {
    title: 'Communication terms',
    paragraphs: ['We may contact you by email or phone about your application and related openings.']
  },
  recruitment: {
    title: 'Recruitment terms',
    paragraphs: ['Submitting an application does not guarantee an interview or an offer of employment.']
  },
  privacy: {
    title: 'Privacy policy',
    paragraphs: [
      'Application data is used only to process your application.',
      'Campaign parameters in links you followed are kept to attribute your visit.'
    ]
  },
  submit: {
    title: 'Application received',
    paragraphs: ['Thank you for applying. We will be in touch.']
  }
}

export function renderInfoPage(key: InfoPageKey, ctx: PageContext): string {
  const page = INFO_PAGES[key]
  const body = page.paragraphs.map((paragraph) => `<p>${escapeHtml(paragraph)}</p>`).join('\n  ')
  return layout(ctx, page.title, body)
}

export function renderApplicationsList(applications: ApplicationRecord[], ctx: PageContext): string {
  const rows = applications
    .map(
      (app) => `
      <tr>
        <td>${app.id}</td>
        <td>${escapeHtml(app.firstName)} ${escapeHtml(app.lastName)}</td>
        <td>${escapeHtml(app.email)}</td>
        <td>${escapeHtml(app.phone)}</td>
        <td>${escapeHtml([app.city, app.country].filter(Boolean).join(', '))}</td>
        <td>${escapeHtml(app.position)}</td>
        <td>${app.resumeFilename ? `<a href="/uploads/${encodeURIComponent(app.resumeFilename)}">${escapeHtml(app.resumeFilename)}</a>` : ''}</td>
        <td>${escapeHtml(app.source)}</td>
        <td>${escapeHtml(app.submittedAt)}</td>
      </tr>`
    )
    .join('')

  const body = applications.length
    ? `<p>Total applications: ${applications.length}</p>
  <table>
    <thead>
      <tr><th>ID</th><th>Name</th><th>Email</th><th>Phone</th><th>Location</th><th>Position</th><th>Resume</th><th>Source</th><th>Submitted</th></tr>
    </thead>
    <tbody>${rows}
    </tbody>
  </table>`
    : '<p>No applications yet.</p>'

  return layout(ctx, 'Applications', body)
}
