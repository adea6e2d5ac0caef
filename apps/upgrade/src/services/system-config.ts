import { readFileSync } from 'node:fs'
import { systemConfigSchema, type SystemConfigValues } from '@linkshare-repair/schema'

export const DEFAULT_CONFIG_PATH = 'config/config.json'

/**
 * Raised when the system config file exists but cannot be used.
 * A missing file is not an error: every key then falls back to its default.
 */
export class ConfigError extends Error {
  path: string

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'ConfigError'
    this.path = path
  }
}

export interface SystemConfigReader {
  getSystemValueString(key: string, defaultValue?: string): string
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

/**
 * Read-only view of the installation's system config (a JSON object on disk).
 *
 * The file is read once, on first access.
 */
export class SystemConfig implements SystemConfigReader {
  private values: SystemConfigValues | null = null

  constructor(private readonly path: string = DEFAULT_CONFIG_PATH) {}

  static fromValues(values: SystemConfigValues): SystemConfig {
    const config = new SystemConfig('<memory>')
    config.values = { ...values }
    return config
  }

  getSystemValue(key: string): unknown {
    return this.load()[key]
  }

  /**
   * String getter: numbers and booleans are stringified, anything else that
   * is not a string yields `defaultValue`.
   */
  getSystemValueString(key: string, defaultValue = ''): string {
    const value = this.getSystemValue(key)
    if (typeof value === 'string') return value
    if (typeof value === 'number' || typeof value === 'boolean') return String(value)
    return defaultValue
  }

  private load(): SystemConfigValues {
    if (this.values) return this.values

    let raw: string
    try {
      raw = readFileSync(this.path, 'utf8')
    } catch (error) {
      if (isMissingFile(error)) {
        this.values = {}
        return this.values
      }
      throw new ConfigError(this.path, `Could not read system config at ${this.path}`, { cause: error })
    }

    let parsed: unknown
    try {
      parsed = JSON.parse(raw)
    } catch (error) {
      throw new ConfigError(this.path, `System config at ${this.path} is not valid JSON`, { cause: error })
    }

    const result = systemConfigSchema.safeParse(parsed)
    if (!result.success) {
      throw new ConfigError(this.path, `System config at ${this.path} must be a JSON object`, {
        cause: result.error,
      })
    }

    this.values = result.data
    return this.values
  }
}
