import type { ApplicationSource } from "../application.types"

export interface ApplicationStatusResponse {
  total_applications: number
  bot_submissions: number
  direct_submissions: number
  database_path: string
  database_exists: boolean
  timestamp: string
}

export interface DebugSubmission {
  id: number
  first_name: string
  last_name: string
  email: string
  source: ApplicationSource
  submitted_at: string | null
  resume: boolean
}

export interface ApplicationDebugResponse {
  recent_submissions: DebugSubmission[]
  total_count: number
}

export interface HealthResponse {
  status: "ok" | "draining"
  timestamp: string
  /** "healthy" or "error: <message>" */
  database: string
  upload_folder: boolean
}
