import { mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { ConfigError, SystemConfig } from '../system-config'

describe('system-config.ts', () => {
  let dir: string

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'linkshare-config-'))
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  function writeConfig(contents: string): string {
    const path = join(dir, 'config.json')
    writeFileSync(path, contents)
    return path
  }

  it('should fall back to the default when the file is missing', () => {
    const config = new SystemConfig(join(dir, 'missing.json'))

    expect(config.getSystemValueString('version', '0.0.0')).toBe('0.0.0')
  })

  it('should read string values', () => {
    const config = new SystemConfig(writeConfig('{"version": "15.0.2"}'))

    expect(config.getSystemValueString('version', '0.0.0')).toBe('15.0.2')
  })

  it('should stringify numbers and booleans', () => {
    const config = new SystemConfig(writeConfig('{"version": 16, "installed": true}'))

    expect(config.getSystemValueString('version')).toBe('16')
    expect(config.getSystemValueString('installed')).toBe('true')
  })

  it('should use the default for structured values', () => {
    const config = new SystemConfig(writeConfig('{"version": {"major": 16}}'))

    expect(config.getSystemValueString('version', '0.0.0')).toBe('0.0.0')
  })

  it('should read the file only once', () => {
    const path = writeConfig('{"version": "14.0.1"}')
    const config = new SystemConfig(path)

    expect(config.getSystemValueString('version')).toBe('14.0.1')
    writeFileSync(path, '{"version": "16.0.4"}')
    expect(config.getSystemValueString('version')).toBe('14.0.1')
  })

  it('should reject malformed JSON', () => {
    const path = writeConfig('{"version": ')
    const config = new SystemConfig(path)

    expect(() => config.getSystemValueString('version')).toThrow(ConfigError)
    expect(() => config.getSystemValueString('version')).toThrow(`System config at ${path} is not valid JSON`)
  })

  it('should reject a non-object document', () => {
    const path = writeConfig('["version"]')
    const config = new SystemConfig(path)

    expect(() => config.getSystemValueString('version')).toThrow(`System config at ${path} must be a JSON object`)
  })

  it('should report unreadable paths', () => {
    const config = new SystemConfig(dir)

    expect(() => config.getSystemValueString('version')).toThrow(`Could not read system config at ${dir}`)
  })

  it('should serve in-memory values', () => {
    const config = SystemConfig.fromValues({ version: '16.0.1' })

    expect(config.getSystemValueString('version', '0.0.0')).toBe('16.0.1')
    expect(config.getSystemValue('missing')).toBeUndefined()
  })
})
