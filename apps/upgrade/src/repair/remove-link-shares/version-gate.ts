import { versionCompare } from '../../lib/version'
import type { SystemConfigReader } from '../../services/system-config'

/**
 * Decides from the pre-upgrade version whether link shares may still carry
 * the over-exposure.
 *
 * The three ranges overlap (anything up to 16.0.0 qualifies); they are kept
 * as separate checks because each one tracks a different release branch.
 */
export class VersionGate {
  constructor(private readonly config: SystemConfigReader) {}

  shouldRun(): boolean {
    const versionFromBeforeUpdate = this.config.getSystemValueString('version', '0.0.0')

    if (versionCompare(versionFromBeforeUpdate, '14.0.11', '<')) {
      return true
    }
    if (versionCompare(versionFromBeforeUpdate, '15.0.8', '<')) {
      return true
    }
    if (versionCompare(versionFromBeforeUpdate, '16.0.0', '<=')) {
      return true
    }

    return false
  }
}
