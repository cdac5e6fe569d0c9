import type { SunTimeField, SunTimes, TimingPolicy } from '@/types'

export const AFTER_SUNRISE_OFFSET_MINUTES = 10

export const TIMING_POLICIES: readonly TimingPolicy[] = [
  'nauticalDawn',
  'civilDawn',
  'atSunrise',
  'afterSunrise'
]

export const DEFAULT_TIMING_POLICY: TimingPolicy = 'atSunrise'

/**
 * Sun time fields in the order they occur during a day
 */
export const SUN_TIME_FIELDS: readonly SunTimeField[] = [
  'nauticalDawnStart',
  'civilDawnStart',
  'sunriseInstant',
  'solarNoonInstant',
  'sunsetInstant',
  'civilDuskEnd',
  'nauticalDuskEnd'
]

export interface TimingPolicyInfo {
  label: string
  description: string
  approximateMinutesBefore: number // negative means after sunrise
}

export const TIMING_POLICY_INFO: Record<TimingPolicy, TimingPolicyInfo> = {
  nauticalDawn: {
    label: 'Nautical Dawn',
    description: 'Sky begins to lighten',
    approximateMinutesBefore: 60
  },
  civilDawn: {
    label: 'Civil Dawn',
    description: 'Soft pre-sunrise glow',
    approximateMinutesBefore: 30
  },
  atSunrise: {
    label: 'Sunrise',
    description: 'Sun crosses the horizon',
    approximateMinutesBefore: 0
  },
  afterSunrise: {
    label: 'After Sunrise',
    description: `${AFTER_SUNRISE_OFFSET_MINUTES} minutes after sunrise`,
    approximateMinutesBefore: -AFTER_SUNRISE_OFFSET_MINUTES
  }
}

/**
 * Get the wake instant for a timing policy.
 * Expects `sunTimes` to be ordered; see validateSunTimes.
 */
export function resolveAlarmTime(sunTimes: SunTimes, policy: TimingPolicy): Date {
  switch (policy) {
    case 'nauticalDawn':
      return new Date(sunTimes.nauticalDawnStart)
    case 'civilDawn':
      return new Date(sunTimes.civilDawnStart)
    case 'atSunrise':
      return new Date(sunTimes.sunriseInstant)
    case 'afterSunrise':
      return new Date(sunTimes.sunriseInstant.getTime() + AFTER_SUNRISE_OFFSET_MINUTES * 60 * 1000)
  }
}

/**
 * Alarms at or before sunrise are presented as "sunrise soon"
 */
export function isBeforeSunrise(policy: TimingPolicy): boolean {
  return policy !== 'afterSunrise'
}

export function isTimingPolicy(value: unknown): value is TimingPolicy {
  return TIMING_POLICIES.some(policy => policy === value)
}

/**
 * List ordering problems in a set of sun times. Empty when valid.
 */
export function validateSunTimes(sunTimes: SunTimes): string[] {
  const problems: string[] = []

  for (const field of SUN_TIME_FIELDS) {
    if (Number.isNaN(sunTimes[field].getTime())) {
      problems.push(`${field} is not a valid time`)
    }
  }
  if (problems.length > 0) {
    return problems
  }

  for (let i = 1; i < SUN_TIME_FIELDS.length; i++) {
    const previous = SUN_TIME_FIELDS[i - 1]
    const current = SUN_TIME_FIELDS[i]
    if (sunTimes[current].getTime() <= sunTimes[previous].getTime()) {
      problems.push(`${current} is not after ${previous}`)
    }
  }

  return problems
}

export function createSunTimes(date: string, instants: Record<SunTimeField, Date>): SunTimes {
  return Object.freeze({
    date,
    nauticalDawnStart: new Date(instants.nauticalDawnStart),
    civilDawnStart: new Date(instants.civilDawnStart),
    sunriseInstant: new Date(instants.sunriseInstant),
    solarNoonInstant: new Date(instants.solarNoonInstant),
    sunsetInstant: new Date(instants.sunsetInstant),
    civilDuskEnd: new Date(instants.civilDuskEnd),
    nauticalDuskEnd: new Date(instants.nauticalDuskEnd)
  })
}
