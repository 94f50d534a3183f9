import fs from 'node:fs'
import fsp from 'node:fs/promises'
import path from 'node:path'
import { StorageError } from '../applications/application.errors'

/** Key to blob store for uploaded resumes, keyed by sanitized filename. */
export interface UploadStore {
  readonly rootDir: string
  ensureDir(): Promise<void>
  /** Writes `buffer` under `filename`, replacing any file of the same name. */
  save(filename: string, buffer: Buffer): Promise<void>
  /** Absolute path for a stored filename, or null when the name is not a plain filename. */
  resolve(filename: string): string | null
  exists(): boolean
}

export class LocalUploadStore implements UploadStore {
  readonly rootDir: string

  constructor(rootDir: string) {
    this.rootDir = path.resolve(rootDir)
  }

  async ensureDir(): Promise<void> {
    await fsp.mkdir(this.rootDir, { recursive: true })
  }

  async save(filename: string, buffer: Buffer): Promise<void> {
    const target = this.resolve(filename)
    if (!target) {
      throw new StorageError(`Refusing to store upload under "${filename}"`)
    }
    try {
      await this.ensureDir()
      await fsp.writeFile(target, buffer)
    } catch (err) {
      throw new StorageError('Failed to write upload', { cause: err })
    }
  }

  resolve(filename: string): string | null {
    if (!filename || filename !== path.basename(filename) || filename.startsWith('.')) {
      return null
    }
    return path.join(this.rootDir, filename)
  }

  exists(): boolean {
    return fs.existsSync(this.rootDir)
  }
}
