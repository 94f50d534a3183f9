import { z } from "zod"
import { APPLICATION_SOURCES } from "../application.types"

/** Required applicant fields, in the order they are validated. */
export const REQUIRED_APPLICATION_FIELDS = ["first_name", "last_name", "email"] as const

export type RequiredApplicationField = (typeof REQUIRED_APPLICATION_FIELDS)[number]

// Multipart parsers hand back an array when a field repeats; keep the first value.
const firstValue = (value: unknown) => (Array.isArray(value) ? value[0] : value)

const requiredText = z.preprocess(firstValue, z.string().trim().min(1))

const optionalText = z.preprocess(
  firstValue,
  z
    .string()
    .optional()
    .transform((value) => {
      const trimmed = value?.trim()
      return trimmed ? trimmed : null
    })
)

/**
 * Multipart form body of an application. Field names match the HTML form
 * and the database columns.
 */
export const applicationFormSchema = z.object({
  first_name: requiredText,
  last_name: requiredText,
  email: requiredText,
  phone: optionalText,
  country: optionalText,
  city: optionalText,
  address: optionalText,
  position: optionalText,
  additional_info: optionalText,
})

export type ApplicationForm = z.infer<typeof applicationFormSchema>

export const applicationSourceSchema = z.enum(APPLICATION_SOURCES)

export const applicationRecordSchema = z.object({
  id: z.number().int().positive(),
  firstName: z.string().min(1),
  lastName: z.string().min(1),
  email: z.string().min(1),
  phone: z.string().nullable(),
  country: z.string().nullable(),
  city: z.string().nullable(),
  address: z.string().nullable(),
  position: z.string().nullable(),
  additionalInfo: z.string().nullable(),
  resumeFilename: z.string().nullable(),
  submittedAt: z.string().refine((value) => !Number.isNaN(Date.parse(value)), { message: "Invalid date string" }),
  source: applicationSourceSchema,
  ipAddress: z.string().nullable(),
})

export const applicationStatusSchema = z.object({
  total_applications: z.number().int().nonnegative(),
  bot_submissions: z.number().int().nonnegative(),
  direct_submissions: z.number().int().nonnegative(),
  database_path: z.string(),
  database_exists: z.boolean(),
  timestamp: z.string(),
})
