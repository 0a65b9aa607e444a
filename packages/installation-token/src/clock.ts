import { TimeError } from './errors'

/** Returns the current time in seconds since the Unix epoch. */
export type Clock = () => number

export const systemClock: Clock = () => Date.now() / 1000

export function readClock(clock: Clock): number {
  const now = clock()
  if (!Number.isFinite(now)) {
    throw new TimeError(`Clock returned a non-finite reading: ${now}`)
  }
  if (now < 0) {
    throw new TimeError(`Clock reads before the Unix epoch: ${now}`)
  }
  return now
}

/**
 * Whole seconds elapsed since `since`, rounded down.
 */
export function secondsSince(clock: Clock, since: number): number {
  const now = readClock(clock)
  if (now < since) {
    throw new TimeError(`Clock moved backwards: now ${now} is earlier than ${since}`)
  }
  return Math.floor(now - since)
}
