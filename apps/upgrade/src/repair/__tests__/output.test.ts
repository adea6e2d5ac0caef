import { describe, expect, it, vi } from 'vitest'
import { ConsoleOutput } from '../output'

function createLogger() {
  return { log: vi.fn(), warn: vi.fn() }
}

describe('output.ts', () => {
  it('should prefix info and warning lines', () => {
    const logger = createLogger()
    const output = new ConsoleOutput('repair', logger)

    output.info('Removing potentially over exposing link shares')
    output.warning('Group "admin" not found')

    expect(logger.log).toHaveBeenCalledWith('[repair] Removing potentially over exposing link shares')
    expect(logger.warn).toHaveBeenCalledWith('[repair] warning: Group "admin" not found')
  })

  it('should report progress once per tenth and at the end', () => {
    const logger = createLogger()
    const output = new ConsoleOutput('repair', logger)

    output.startProgress(20)
    for (let index = 0; index < 20; index += 1) output.advance()
    output.finishProgress()

    expect(logger.log.mock.calls.map(([line]) => line)).toEqual([
      '[repair] 0/20',
      '[repair] 2/20',
      '[repair] 4/20',
      '[repair] 6/20',
      '[repair] 8/20',
      '[repair] 10/20',
      '[repair] 12/20',
      '[repair] 14/20',
      '[repair] 16/20',
      '[repair] 18/20',
      '[repair] 20/20 done',
    ])
  })

  it('should only count when no total was given', () => {
    const logger = createLogger()
    const output = new ConsoleOutput('repair', logger)

    output.startProgress()
    output.advance()
    output.advance(2)
    output.finishProgress()

    expect(logger.log.mock.calls.map(([line]) => line)).toEqual(['[repair] 0/0', '[repair] 3/3 done'])
  })
})
