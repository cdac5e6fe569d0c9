// Shared fakes and fixtures for the service tests
import { vi } from 'vitest'
import { alarmError } from '@/errors'
import { formatLocalDate } from '@/services/calendar'
import { createSunTimes } from '@/services/sun-times-resolver'
import type {
  AlarmErrorCode,
  AlarmMetadata,
  AlarmScheduler,
  ArmedAlarmsListener,
  SavedLocation,
  SchedulerResult,
  SunTimes,
  SunTimesResult,
  TimeService
} from '@/types'

export function mockDate(dateString: string): void {
  vi.useFakeTimers()
  vi.setSystemTime(new Date(dateString))
}

export function restoreDate(): void {
  vi.useRealTimers()
}

/**
 * Local wall-clock time on a YYYY-MM-DD day
 */
export function at(day: string, time: string): Date {
  const [year, month, date] = day.split('-').map(Number)
  const [hours, minutes, seconds = 0] = time.split(':').map(Number)
  return new Date(year, month - 1, date, hours, minutes, seconds)
}

/**
 * A typical mid-latitude summer day
 */
export function sunTimesFor(day: string): SunTimes {
  return createSunTimes(day, {
    nauticalDawnStart: at(day, '06:05:00'),
    civilDawnStart: at(day, '06:42:00'),
    sunriseInstant: at(day, '07:12:00'),
    solarNoonInstant: at(day, '13:10:00'),
    sunsetInstant: at(day, '19:08:00'),
    civilDuskEnd: at(day, '19:38:00'),
    nauticalDuskEnd: at(day, '20:15:00')
  })
}

export const seattle: SavedLocation = {
  id: 'loc-seattle',
  name: 'Seattle, WA',
  latitude: 47.6062,
  longitude: -122.3321,
  isSelected: true
}

export const london: SavedLocation = {
  id: 'loc-london',
  name: 'London, UK',
  latitude: 51.5074,
  longitude: -0.1278,
  isSelected: false
}

export interface SunTimesRequest {
  latitude: number
  longitude: number
  date: string
}

/**
 * Time service answering from a queue of canned results, or with sunTimesFor(date)
 */
export class FakeTimeService implements TimeService {
  readonly requests: SunTimesRequest[] = []
  private readonly queued: Array<SunTimesResult | Promise<SunTimesResult>> = []

  respondWith(result: SunTimesResult | Promise<SunTimesResult>): void {
    this.queued.push(result)
  }

  failWith(code: AlarmErrorCode, message = `${code} from fake`): void {
    this.queued.push({ success: false, error: alarmError(code, message) })
  }

  async fetchSunTimes(latitude: number, longitude: number, date: Date): Promise<SunTimesResult> {
    const day = formatLocalDate(date)
    this.requests.push({ latitude, longitude, date: day })
    const next = this.queued.shift()
    if (next) {
      return next
    }
    return { success: true, sunTimes: sunTimesFor(day) }
  }
}

export type SchedulerEvent =
  | { type: 'arm'; id: string; instant: Date; metadata: AlarmMetadata }
  | { type: 'cancel'; id: string }

/**
 * Scheduler that records every call and notes any arm issued while another alarm is armed
 */
export class RecordingScheduler implements AlarmScheduler {
  readonly events: SchedulerEvent[] = []
  readonly violations: string[] = []
  private readonly armed = new Set<string>()
  private readonly listeners = new Set<ArmedAlarmsListener>()
  private readonly armRejections: string[] = []

  rejectNextArm(reason: string): void {
    this.armRejections.push(reason)
  }

  async arm(id: string, instant: Date, metadata: AlarmMetadata): Promise<SchedulerResult> {
    this.events.push({ type: 'arm', id, instant: new Date(instant), metadata: { ...metadata } })

    const rejection = this.armRejections.shift()
    if (rejection !== undefined) {
      return { success: false, reason: rejection }
    }

    if (this.armed.size > 0) {
      this.violations.push(`arm(${id}) while ${[...this.armed].join(', ')} armed`)
    }
    this.armed.add(id)
    this.notify()
    return { success: true }
  }

  async cancel(id: string): Promise<SchedulerResult> {
    this.events.push({ type: 'cancel', id })
    if (!this.armed.delete(id)) {
      return { success: false, reason: `unknown alarm ${id}` }
    }
    this.notify()
    return { success: true }
  }

  armedAlarmIds(): readonly string[] {
    return [...this.armed]
  }

  subscribe(listener: ArmedAlarmsListener): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  listenerCount(): number {
    return this.listeners.size
  }

  /**
   * Alarm silenced outside the app
   */
  dismiss(id: string): void {
    this.armed.delete(id)
    this.notify()
  }

  /**
   * Pretend an alarm survived from a previous run
   */
  preArm(id: string): void {
    this.armed.add(id)
  }

  private notify(): void {
    const ids = this.armedAlarmIds()
    for (const listener of this.listeners) {
      listener(ids)
    }
  }
}

/**
 * Sequential ids: alarm-1, alarm-2, ...
 */
export function sequentialIds(prefix = 'alarm'): () => string {
  let next = 1
  return () => `${prefix}-${next++}`
}
