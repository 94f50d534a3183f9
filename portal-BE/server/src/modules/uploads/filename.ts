const WINDOWS_DEVICE_NAMES = new Set([
  'CON', 'PRN', 'AUX', 'NUL',
  'COM1', 'COM2', 'COM3', 'COM4', 'COM5', 'COM6', 'COM7', 'COM8', 'COM9',
  'LPT1', 'LPT2', 'LPT3', 'LPT4', 'LPT5', 'LPT6', 'LPT7', 'LPT8', 'LPT9'
])

/**
 * Reduces a client-supplied filename to something safe to use as a single path
 * segment: ASCII letters, digits, `_`, `.` and `-` only, no path separators,
 * no leading or trailing dots or underscores.
 *
 * "../../etc/passwd" becomes "etc_passwd". May return an empty string when
 * nothing usable is left.
 */
export function sanitizeFilename(filename: string): string {
  let name = filename.normalize('NFKD').replace(/[^\x00-\x7f]/g, '')
  name = name.replace(/[/\\]/g, ' ')
  name = name.split(/\s+/).filter(Boolean).join('_')
  name = name.replace(/[^A-Za-z0-9_.-]/g, '')
  name = name.replace(/^[._]+|[._]+$/g, '')

  const stem = name.split('.')[0].toUpperCase()
  if (name && WINDOWS_DEVICE_NAMES.has(stem)) {
    name = `_${name}`
  }
  return name
}
