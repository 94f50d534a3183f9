import {
  REQUIRED_APPLICATION_FIELDS,
  applicationFormSchema,
  type ApplicationForm,
  type ApplicationRecord,
  type FlashMessage,
  type NewApplication,
  type PreservedParams
} from '@apply-portal/shared'
import type { Logger } from 'pino'
import { logger as rootLogger } from '../../logger'
import type { AppConfig } from '../../config/app-config'
import { buildRedirectUrl } from '../params/param-preserver'
import { sanitizeFilename } from '../uploads/filename'
import type { UploadStore } from '../uploads/upload-store'
import type { ApplicationStore } from './application.repository'
import { classifySource } from './source-classifier'

export const FORM_PATH = '/'

export const SUBMISSION_MESSAGES = {
  success: 'Application submitted successfully!',
  noFileSelected: 'No selected file',
  invalidFilename: 'Invalid file name',
  storageFailure: 'Error submitting application. Please try again.',
  internalError: 'An internal error occurred. Please try again.'
} as const

export interface ResumeUpload {
  /** Filename as sent by the client; empty when the file input was left blank */
  originalName: string
  buffer: Buffer
}

export interface SubmissionRequest {
  /** Multipart text fields */
  fields: unknown
  /** Present when the request carried a `resume` file part */
  resume?: ResumeUpload
  userAgent?: string
  clientIp: string | null
  preservedParams: PreservedParams
}

export type SubmissionOutcome =
  | { status: 'redirect-success'; redirectUrl: string; flash: FlashMessage; record: ApplicationRecord }
  | { status: 'redirect-validation-error'; redirectUrl: string; flash: FlashMessage }
  | { status: 'redirect-server-error'; redirectUrl: string; flash: FlashMessage }

type Step<T> = { ok: true; value: T } | { ok: false; outcome: SubmissionOutcome }

/** "first_name" -> "First Name" */
export function fieldTitle(field: string): string {
  return field
    .split('_')
    .map((word) => (word ? word[0].toUpperCase() + word.slice(1).toLowerCase() : word))
    .join(' ')
}

const isRequiredField = (field: string) => REQUIRED_APPLICATION_FIELDS.some((required) => required === field)

export interface SubmissionServiceDeps {
  store: ApplicationStore
  uploads: UploadStore
  config: Pick<AppConfig, 'l1RedirectUrl'>
  logger?: Logger
}

/**
 * Runs one application submission: validate, store the resume, classify,
 * persist, then pick the redirect. Expected failures come back as outcomes;
 * nothing here throws for bad input.
 */
export class ApplicationSubmissionService {
  private readonly store: ApplicationStore
  private readonly uploads: UploadStore
  private readonly l1RedirectUrl: string
  private readonly log: Logger

  constructor(deps: SubmissionServiceDeps) {
    this.store = deps.store
    this.uploads = deps.uploads
    this.l1RedirectUrl = deps.config.l1RedirectUrl
    this.log = deps.logger ?? rootLogger
  }

  async submit(request: SubmissionRequest): Promise<SubmissionOutcome> {
    const form = this.validate(request)
    if (!form.ok) return form.outcome

    const resume = await this.storeResume(request)
    if (!resume.ok) return resume.outcome

    const source = classifySource(request.userAgent)
    const application: NewApplication = {
      firstName: form.value.first_name,
      lastName: form.value.last_name,
      email: form.value.email,
      phone: form.value.phone,
      country: form.value.country,
      city: form.value.city,
      address: form.value.address,
      position: form.value.position,
      additionalInfo: form.value.additional_info,
      resumeFilename: resume.value,
      source,
      ipAddress: request.clientIp
    }

    let record: ApplicationRecord
    try {
      record = this.store.insert(application)
    } catch (err) {
      this.log.error({ err, clientIp: request.clientIp }, 'Failed to save application')
      return this.serverError(request, SUBMISSION_MESSAGES.storageFailure)
    }

    this.log.info(
      { id: record.id, source: record.source, resume: record.resumeFilename !== null },
      'Application saved'
    )

    return {
      status: 'redirect-success',
      redirectUrl: buildRedirectUrl(this.l1RedirectUrl, request.preservedParams),
      flash: { category: 'success', message: SUBMISSION_MESSAGES.success },
      record
    }
  }

  private validate(request: SubmissionRequest): Step<ApplicationForm> {
    const parsed = applicationFormSchema.safeParse(request.fields ?? {})
    if (parsed.success) {
      return { ok: true, value: parsed.data }
    }

    const field = String(parsed.error.issues[0]?.path[0] ?? 'form')
    const message = isRequiredField(field)
      ? `Missing required field: ${fieldTitle(field)}`
      : `Invalid field: ${fieldTitle(field)}`
    this.log.info({ field }, 'Application rejected by validation')
    return { ok: false, outcome: this.validationError(request, message) }
  }

  private async storeResume(request: SubmissionRequest): Promise<Step<string | null>> {
    const { resume } = request
    if (!resume) return { ok: true, value: null }

    if (!resume.originalName) {
      return { ok: false, outcome: this.validationError(request, SUBMISSION_MESSAGES.noFileSelected) }
    }

    const filename = sanitizeFilename(resume.originalName)
    if (!filename) {
      return { ok: false, outcome: this.validationError(request, SUBMISSION_MESSAGES.invalidFilename) }
    }

    try {
      await this.uploads.save(filename, resume.buffer)
    } catch (err) {
      this.log.error({ err, filename }, 'Failed to store resume')
      return { ok: false, outcome: this.serverError(request, SUBMISSION_MESSAGES.storageFailure) }
    }

    this.log.info({ filename, bytes: resume.buffer.length }, 'Resume stored')
    return { ok: true, value: filename }
  }

  private validationError(request: SubmissionRequest, message: string): SubmissionOutcome {
    return {
      status: 'redirect-validation-error',
      redirectUrl: buildRedirectUrl(FORM_PATH, request.preservedParams),
      flash: { category: 'error', message }
    }
  }

  private serverError(request: SubmissionRequest, message: string): SubmissionOutcome {
    return {
      status: 'redirect-server-error',
      redirectUrl: buildRedirectUrl(FORM_PATH, request.preservedParams),
      flash: { category: 'error', message }
    }
  }
}
