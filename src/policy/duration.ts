/**
 * Duration Arithmetic
 *
 * Cache windows are written as components (`{ hours: 1, minutes: 30 }`) and
 * compared as a total number of seconds. A month is 30 days, a year 365.
 */

export const DURATION_UNITS = [
  'seconds',
  'minutes',
  'hours',
  'days',
  'weeks',
  'months',
  'years'
] as const

export type DurationUnit = (typeof DURATION_UNITS)[number]

export const SECONDS_PER_UNIT: Readonly<Record<DurationUnit, number>> = {
  seconds: 1,
  minutes: 60,
  hours: 60 * 60,
  days: 24 * 60 * 60,
  weeks: 7 * 24 * 60 * 60,
  months: 30 * 24 * 60 * 60,
  years: 365 * 24 * 60 * 60
}

export type DurationParts = { readonly [U in DurationUnit]?: number | undefined }

export function isDurationUnit(name: string): name is DurationUnit {
  return Object.hasOwn(SECONDS_PER_UNIT, name)
}

/**
 * Total length of a duration in seconds. Missing components count as zero.
 *
 * @example
 * ```ts
 * totalSeconds({ minutes: 1, seconds: 30 }) // 90
 * totalSeconds({ months: 1 })               // 2592000
 * ```
 */
export function totalSeconds(parts: DurationParts): number {
  let total = 0
  for (const unit of DURATION_UNITS) {
    const amount = parts[unit]
    if (amount !== undefined) {
      total += amount * SECONDS_PER_UNIT[unit]
    }
  }
  return total
}
