/**
 * @fileoverview VersionGate tests
 *
 * @description
 * Boundary versions around the three release-branch thresholds.
 *
 * @architecture
 * Tests: src/repair/remove-link-shares/__tests__/version-gate.test.ts
 * Tests: version-gate.ts
 */

import { describe, expect, it } from 'vitest'
import { SystemConfig, type SystemConfigReader } from '../../../services/system-config'
import { VersionGate } from '../version-gate'

function gateFor(version?: string): VersionGate {
  return new VersionGate(SystemConfig.fromValues(version === undefined ? {} : { version }))
}

describe('version-gate.ts', () => {
  it.each([
    ['0.0.0', true],
    ['13.0.12', true],
    ['14.0.10', true],
    ['14.0.11', true],
    ['15.0.7', true],
    ['15.0.8', true],
    ['15.0.14', true],
    ['16.0.0', true],
    ['16.0.0.1', false],
    ['16.0.1', false],
    ['17.0.2', false],
  ])('should return %s -> %s', (version, expected) => {
    expect(gateFor(version).shouldRun()).toBe(expected)
  })

  it('should run when no previous version is recorded', () => {
    expect(gateFor().shouldRun()).toBe(true)
  })

  it('should read the version key with the 0.0.0 default', () => {
    const reads: Array<[string, string | undefined]> = []
    const config: SystemConfigReader = {
      getSystemValueString(key, defaultValue) {
        reads.push([key, defaultValue])
        return '16.0.1'
      },
    }

    expect(new VersionGate(config).shouldRun()).toBe(false)
    expect(reads).toEqual([['version', '0.0.0']])
  })
})
