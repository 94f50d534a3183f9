export const APPLICATION_SOURCES = ["direct", "bot"] as const

/** How a submission reached the form, judged from its User-Agent. Analytics only. */
export type ApplicationSource = (typeof APPLICATION_SOURCES)[number]

export interface ApplicationRecord {
  readonly id: number
  readonly firstName: string
  readonly lastName: string
  readonly email: string
  readonly phone: string | null
  readonly country: string | null
  readonly city: string | null
  readonly address: string | null
  readonly position: string | null
  readonly additionalInfo: string | null
  readonly resumeFilename: string | null
  /** ISO-8601, assigned by the store on insert */
  readonly submittedAt: string
  readonly source: ApplicationSource
  readonly ipAddress: string | null
}

/** Everything the submitter provides; identity and timestamp come from the store. */
export type NewApplication = Omit<ApplicationRecord, "id" | "submittedAt">

export interface ApplicationCountFilter {
  source?: ApplicationSource
}

/** Marketing parameters carried across redirects, in order of first appearance. */
export type PreservedParams = Record<string, string>

export type FlashCategory = "success" | "error"

export interface FlashMessage {
  category: FlashCategory
  message: string
}
