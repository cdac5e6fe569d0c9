import { z } from 'zod'
import type { SunTimeField, SunTimesResult, TimeService } from '@/types'
import { alarmError, describeError } from '@/errors'
import { createLogger } from '@/logger'
import { addDays, anchorToDay, formatLocalDate } from './calendar'
import { isValidCoordinate } from './geolocation'
import { createSunTimes, SUN_TIME_FIELDS, validateSunTimes } from './sun-times-resolver'

const log = createLogger('sunrise-service')

export const DEFAULT_API_URL = 'https://api.sunrise-sunset.org/json'
export const DEFAULT_FETCH_TIMEOUT_MS = 10000

// Events that never happen on a day (polar regions) are reported at the epoch
const MAX_DISTANCE_FROM_DAY_MS = 48 * 60 * 60 * 1000

const envelopeSchema = z.object({
  status: z.string(),
  results: z.unknown()
})

const resultsSchema = z.object({
  sunrise: z.string(),
  sunset: z.string(),
  solar_noon: z.string(),
  day_length: z.number().optional(),
  civil_twilight_begin: z.string(),
  civil_twilight_end: z.string(),
  nautical_twilight_begin: z.string(),
  nautical_twilight_end: z.string(),
  astronomical_twilight_begin: z.string().optional(),
  astronomical_twilight_end: z.string().optional()
})

type SunriseResults = z.infer<typeof resultsSchema>

const RESULT_FIELDS: Record<SunTimeField, keyof SunriseResults> = {
  nauticalDawnStart: 'nautical_twilight_begin',
  civilDawnStart: 'civil_twilight_begin',
  sunriseInstant: 'sunrise',
  solarNoonInstant: 'solar_noon',
  sunsetInstant: 'sunset',
  civilDuskEnd: 'civil_twilight_end',
  nauticalDuskEnd: 'nautical_twilight_end'
}

const ISO_TIMESTAMP = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(?:\.(\d+))?(Z|[+-]\d{2}:?\d{2})$/

/**
 * Parse an ISO-8601 timestamp with or without fractional seconds,
 * with a `Z` suffix or an explicit `+HH:MM` / `+HHMM` offset
 */
export function parseIsoTimestamp(value: string): Date | null {
  const match = ISO_TIMESTAMP.exec(value.trim())
  if (!match) {
    return null
  }

  const [, year, month, day, hour, minute, second, fraction, zone] = match
  const millis = fraction ? Number(fraction.slice(0, 3).padEnd(3, '0')) : 0

  const fields = [year, month, day, hour, minute, second].map(Number)
  const [y, mo, d, h, mi, s] = fields
  if (mo < 1 || mo > 12 || d < 1 || d > 31 || h > 23 || mi > 59 || s > 59) {
    return null
  }

  let offsetMinutes = 0
  if (zone !== 'Z') {
    const sign = zone.startsWith('-') ? -1 : 1
    const digits = zone.slice(1).replace(':', '')
    offsetMinutes = sign * (Number(digits.slice(0, 2)) * 60 + Number(digits.slice(2, 4)))
  }

  const utc = Date.UTC(y, mo - 1, d, h, mi, s, millis)
  // Reject days that roll over into the next month (e.g. Feb 30)
  if (new Date(utc).getUTCDate() !== d) {
    return null
  }

  return new Date(utc - offsetMinutes * 60 * 1000)
}

export interface SunriseServiceOptions {
  apiUrl?: string
  timeoutMs?: number
  fetchImpl?: typeof fetch
}

/**
 * Fetches twilight times from the sunrise-sunset JSON API
 */
export class SunriseService implements TimeService {
  private readonly apiUrl: string
  private readonly timeoutMs: number
  private readonly fetchImpl: typeof fetch

  constructor(options: SunriseServiceOptions = {}) {
    this.apiUrl = options.apiUrl ?? DEFAULT_API_URL
    this.timeoutMs = options.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init))
  }

  /**
   * Fetch all sun times for the local calendar day of `date`
   */
  async fetchSunTimes(latitude: number, longitude: number, date: Date): Promise<SunTimesResult> {
    if (!isValidCoordinate(latitude, longitude)) {
      return {
        success: false,
        error: alarmError('INVALID_COORDINATES', `Coordinates out of range: ${latitude}, ${longitude}`)
      }
    }

    const dateString = formatLocalDate(date)
    let url: URL
    try {
      url = new URL(this.apiUrl)
    } catch {
      return { success: false, error: alarmError('NETWORK_FAILURE', `Invalid URL: ${this.apiUrl}`) }
    }
    url.searchParams.set('lat', String(latitude))
    url.searchParams.set('lng', String(longitude))
    url.searchParams.set('formatted', '0')
    url.searchParams.set('date', dateString)

    const controller = new AbortController()
    let timedOut = false
    const timer = setTimeout(() => {
      timedOut = true
      controller.abort()
    }, this.timeoutMs)

    let body: unknown
    try {
      log.debug(`Fetching sun times for ${dateString}`, { latitude, longitude })
      const response = await this.fetchImpl(url.toString(), { signal: controller.signal })

      if (!response.ok) {
        return {
          success: false,
          error: alarmError('NETWORK_FAILURE', `Time service responded with HTTP ${response.status}`)
        }
      }

      try {
        body = await response.json()
      } catch (error) {
        if (timedOut) {
          throw error
        }
        return { success: false, error: alarmError('MALFORMED_RESPONSE', 'Response body is not valid JSON') }
      }
    } catch (error) {
      if (timedOut) {
        log.warn(`Sun times request timed out after ${this.timeoutMs}ms`)
        return {
          success: false,
          error: alarmError('TIMEOUT', `Time service did not respond within ${this.timeoutMs}ms`)
        }
      }
      log.warn('Sun times request failed', error)
      return {
        success: false,
        error: alarmError('NETWORK_FAILURE', `Failed to fetch sun times: ${describeError(error)}`)
      }
    } finally {
      clearTimeout(timer)
    }

    return parseSunTimesResponse(body, date)
  }
}

/**
 * Decode an API payload into sun times anchored on the local day of `date`
 */
export function parseSunTimesResponse(body: unknown, date: Date): SunTimesResult {
  const envelope = envelopeSchema.safeParse(body)
  if (!envelope.success) {
    return { success: false, error: alarmError('MALFORMED_RESPONSE', 'Response is missing status or results') }
  }
  if (envelope.data.status !== 'OK') {
    return {
      success: false,
      error: alarmError('MALFORMED_RESPONSE', `Time service returned status ${envelope.data.status}`)
    }
  }

  const results = resultsSchema.safeParse(envelope.data.results)
  if (!results.success) {
    const fields = results.error.issues.map(issue => issue.path.join('.')).join(', ')
    return { success: false, error: alarmError('MALFORMED_RESPONSE', `Missing sun time fields: ${fields}`) }
  }

  const dateString = formatLocalDate(date)
  const localNoon = new Date(date.getFullYear(), date.getMonth(), date.getDate(), 12)
  const instants: Partial<Record<SunTimeField, Date>> = {}
  let previous: { parsed: Date; anchored: Date } | null = null

  for (const field of SUN_TIME_FIELDS) {
    const source = RESULT_FIELDS[field]
    const raw = results.data[source]
    const parsed = typeof raw === 'string' ? parseIsoTimestamp(raw) : null

    if (!parsed) {
      return { success: false, error: alarmError('MALFORMED_RESPONSE', `Could not parse ${source}: ${String(raw)}`) }
    }
    if (Math.abs(parsed.getTime() - localNoon.getTime()) > MAX_DISTANCE_FROM_DAY_MS) {
      return {
        success: false,
        error: alarmError('MALFORMED_RESPONSE', `${source} does not occur on ${dateString} at this location`)
      }
    }

    // An event past local midnight (late dusk in high-latitude summers) belongs to the next day
    let anchored = anchorToDay(parsed, date)
    if (
      previous &&
      parsed.getTime() > previous.parsed.getTime() &&
      anchored.getTime() <= previous.anchored.getTime()
    ) {
      anchored = anchorToDay(parsed, addDays(date, 1))
    }

    instants[field] = anchored
    previous = { parsed, anchored }
  }

  const {
    nauticalDawnStart,
    civilDawnStart,
    sunriseInstant,
    solarNoonInstant,
    sunsetInstant,
    civilDuskEnd,
    nauticalDuskEnd
  } = instants
  if (
    !nauticalDawnStart ||
    !civilDawnStart ||
    !sunriseInstant ||
    !solarNoonInstant ||
    !sunsetInstant ||
    !civilDuskEnd ||
    !nauticalDuskEnd
  ) {
    return { success: false, error: alarmError('MALFORMED_RESPONSE', 'Could not parse sun times') }
  }

  const sunTimes = createSunTimes(dateString, {
    nauticalDawnStart,
    civilDawnStart,
    sunriseInstant,
    solarNoonInstant,
    sunsetInstant,
    civilDuskEnd,
    nauticalDuskEnd
  })

  const problems = validateSunTimes(sunTimes)
  if (problems.length > 0) {
    return {
      success: false,
      error: alarmError('MALFORMED_RESPONSE', `Sun times out of order for ${dateString}: ${problems.join('; ')}`)
    }
  }

  return { success: true, sunTimes }
}
