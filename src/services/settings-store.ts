import { mkdir, readFile, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'
import { z } from 'zod'
import type { SettingsKey, SettingsStore } from '@/types'
import { createLogger } from '@/logger'

const log = createLogger('settings-store')

/**
 * Settings held in process memory only
 */
export class MemorySettingsStore implements SettingsStore {
  private readonly values = new Map<SettingsKey, string>()

  async get(key: SettingsKey): Promise<string | null> {
    return this.values.get(key) ?? null
  }

  async set(key: SettingsKey, value: string): Promise<void> {
    this.values.set(key, value)
  }

  async remove(key: SettingsKey): Promise<void> {
    this.values.delete(key)
  }
}

const documentSchema = z.record(z.string())

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

/**
 * Settings kept in a single JSON document on disk.
 * The document is read once and rewritten after every change; writes are applied in call order.
 */
export class FileSettingsStore implements SettingsStore {
  private values: Map<string, string> | null = null
  private loading: Promise<Map<string, string>> | null = null
  private writing: Promise<void> = Promise.resolve()

  constructor(private readonly filePath: string) {}

  async get(key: SettingsKey): Promise<string | null> {
    const values = await this.load()
    return values.get(key) ?? null
  }

  async set(key: SettingsKey, value: string): Promise<void> {
    const values = await this.load()
    values.set(key, value)
    await this.persist()
  }

  async remove(key: SettingsKey): Promise<void> {
    const values = await this.load()
    if (values.delete(key)) {
      await this.persist()
    }
  }

  private load(): Promise<Map<string, string>> {
    if (this.values) {
      return Promise.resolve(this.values)
    }
    if (!this.loading) {
      this.loading = this.readDocument().then(values => {
        this.values = values
        return values
      })
    }
    return this.loading
  }

  private async readDocument(): Promise<Map<string, string>> {
    let raw: string
    try {
      raw = await readFile(this.filePath, 'utf8')
    } catch (error) {
      if (isMissingFile(error)) {
        return new Map()
      }
      throw error
    }

    try {
      const parsed = documentSchema.safeParse(JSON.parse(raw))
      if (parsed.success) {
        return new Map(Object.entries(parsed.data))
      }
      log.warn(`Ignoring malformed settings document ${this.filePath}`, parsed.error.issues)
    } catch (error) {
      log.warn(`Ignoring unreadable settings document ${this.filePath}`, error)
    }
    return new Map()
  }

  private persist(): Promise<void> {
    const write = this.writing.then(async () => {
      const snapshot = Object.fromEntries(this.values ?? new Map<string, string>())
      await mkdir(dirname(this.filePath), { recursive: true })
      await writeFile(this.filePath, `${JSON.stringify(snapshot, null, 2)}\n`, 'utf8')
    })
    // A failed write must not block the ones queued after it
    this.writing = write.catch(error => {
      log.error(`Failed to write settings to ${this.filePath}`, error)
    })
    return write
  }
}
