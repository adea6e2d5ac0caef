/**
 * Progress/output sink handed to repair steps by the runner.
 * Purely observational: steps never read anything back.
 */
export interface RepairOutput {
  info(message: string): void
  warning(message: string): void
  startProgress(max?: number): void
  advance(step?: number): void
  finishProgress(): void
}

type ConsoleLike = Pick<Console, 'log' | 'warn'>

/**
 * Console-backed output.
 *
 * Progress is printed as `current/max` lines, once per 10% and once at the
 * end, so large runs do not flood the upgrade log.
 */
export class ConsoleOutput implements RepairOutput {
  private max = 0
  private current = 0
  private lastDecile = 0

  constructor(
    private readonly prefix = 'repair',
    private readonly logger: ConsoleLike = console,
  ) {}

  info(message: string): void {
    this.logger.log(`[${this.prefix}] ${message}`)
  }

  warning(message: string): void {
    this.logger.warn(`[${this.prefix}] warning: ${message}`)
  }

  startProgress(max = 0): void {
    this.max = max
    this.current = 0
    this.lastDecile = 0
    this.logger.log(`[${this.prefix}] 0/${max}`)
  }

  advance(step = 1): void {
    this.current += step
    if (this.max <= 0) return

    const decile = Math.floor((this.current * 10) / this.max)
    if (decile > this.lastDecile && this.current < this.max) {
      this.lastDecile = decile
      this.logger.log(`[${this.prefix}] ${this.current}/${this.max}`)
    }
  }

  finishProgress(): void {
    const max = Math.max(this.max, this.current)
    this.logger.log(`[${this.prefix}] ${this.current}/${max} done`)
    this.max = 0
    this.current = 0
    this.lastDecile = 0
  }
}
