/**
 * Clock seam. Repair steps read time through this so runs can be replayed
 * with a fixed instant.
 */
export interface TimeFactory {
  now(): Date
}

export const systemClock: TimeFactory = {
  now: () => new Date(),
}

export function fixedClock(instant: Date): TimeFactory {
  return { now: () => new Date(instant.getTime()) }
}
