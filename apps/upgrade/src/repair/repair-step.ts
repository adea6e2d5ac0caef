import type { RepairOutput } from './output'

/**
 * One unit of upgrade-time data repair.
 *
 * Steps decide for themselves whether they have work to do and must be safe
 * to run again after a partial failure.
 */
export interface RepairStep {
  getName(): string
  run(output: RepairOutput): Promise<void>
}

export class RepairStepError extends Error {
  stepName: string

  constructor(stepName: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause)
    super(`Repair step "${stepName}" failed: ${reason}`, { cause })
    this.name = 'RepairStepError'
    this.stepName = stepName
  }
}

/**
 * Runs steps in order and stops at the first failure. Nothing is retried or
 * rolled back; recovery belongs to whoever drives the upgrade.
 */
export async function runRepairSteps(steps: RepairStep[], output: RepairOutput): Promise<void> {
  for (const step of steps) {
    const name = step.getName()
    output.info(`Repair step: ${name}`)

    try {
      await step.run(output)
    } catch (error) {
      throw new RepairStepError(name, error)
    }
  }
}
