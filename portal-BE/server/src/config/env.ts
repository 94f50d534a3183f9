import { config as loadEnv } from 'dotenv'
import { z } from 'zod'

// Load .env when running locally; deployments supply env vars directly
loadEnv()

const booleanString = z.enum(['true', 'false']).transform((value) => value === 'true')

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().default(5000),
  DATABASE_PATH: z.string().min(1, 'DATABASE_PATH must not be empty').default('instance/job_portal.db'),
  UPLOAD_DIR: z.string().min(1, 'UPLOAD_DIR must not be empty').default('uploads'),
  MAX_CONTENT_LENGTH: z.coerce.number().int().positive().default(16 * 1024 * 1024),

  // Downstream application tracker ("L1") that successful applicants are sent to
  L1_REDIRECT_URL: z.string().url().default('https://apply.example.com/submit'),

  LOG_LEVEL: z.string().optional(),
  DRAIN_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  COOKIE_SECURE: booleanString.optional()
})

export type Env = z.infer<typeof EnvSchema>

export const env: Env = EnvSchema.parse(process.env)
