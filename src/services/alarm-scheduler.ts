import type { AlarmMetadata, AlarmScheduler, ArmedAlarmsListener, SchedulerResult } from '@/types'
import { createLogger } from '@/logger'

const log = createLogger('alarm-scheduler')

// setTimeout cannot wait longer than this
const MAX_TIMER_DELAY_MS = 2 ** 31 - 1

export type AuthorizationState = 'notDetermined' | 'authorized' | 'denied'

export interface ArmedAlarm {
  id: string
  instant: Date
  metadata: AlarmMetadata
}

export interface TimerAlarmSchedulerOptions {
  authorization?: AuthorizationState
  /**
   * Asked once while authorization is undetermined; grants by default
   */
  requestPermission?: () => Promise<boolean>
  onFire?: (alarm: ArmedAlarm) => void
  now?: () => Date
}

/**
 * Alarm scheduler that fires alarms from in-process timers
 */
export class TimerAlarmScheduler implements AlarmScheduler {
  private readonly alarms = new Map<string, { alarm: ArmedAlarm; timer: NodeJS.Timeout }>()
  private readonly listeners = new Set<ArmedAlarmsListener>()
  private authorization: AuthorizationState
  private readonly requestPermission: () => Promise<boolean>
  private readonly onFire: (alarm: ArmedAlarm) => void
  private readonly now: () => Date

  constructor(options: TimerAlarmSchedulerOptions = {}) {
    this.authorization = options.authorization ?? 'notDetermined'
    this.requestPermission = options.requestPermission ?? (async () => true)
    this.onFire = options.onFire ?? (() => {})
    this.now = options.now ?? (() => new Date())
  }

  getAuthorizationState(): AuthorizationState {
    return this.authorization
  }

  async requestAuthorization(): Promise<boolean> {
    switch (this.authorization) {
      case 'authorized':
        return true
      case 'denied':
        return false
      case 'notDetermined':
        try {
          this.authorization = (await this.requestPermission()) ? 'authorized' : 'denied'
        } catch (error) {
          log.error('Authorization request failed', error)
          return false
        }
        return this.authorization === 'authorized'
    }
  }

  /**
   * Revoke permission; armed alarms stay armed until they fire or are cancelled
   */
  revokeAuthorization(): void {
    this.authorization = 'denied'
  }

  async arm(id: string, instant: Date, metadata: AlarmMetadata): Promise<SchedulerResult> {
    if (this.authorization !== 'authorized') {
      return { success: false, reason: 'Alarm scheduling is not authorized' }
    }
    if (Number.isNaN(instant.getTime())) {
      return { success: false, reason: 'Alarm time is not a valid date' }
    }
    if (instant.getTime() <= this.now().getTime()) {
      return { success: false, reason: `Alarm time ${instant.toISOString()} is not in the future` }
    }

    const existing = this.alarms.get(id)
    if (existing) {
      clearTimeout(existing.timer)
    }

    const alarm: ArmedAlarm = { id, instant: new Date(instant), metadata: { ...metadata } }
    this.alarms.set(id, { alarm, timer: this.startTimer(alarm) })
    log.info(`Armed alarm ${id} for ${instant.toISOString()}`)
    this.notify()
    return { success: true }
  }

  async cancel(id: string): Promise<SchedulerResult> {
    const entry = this.alarms.get(id)
    if (!entry) {
      return { success: false, reason: `No alarm armed with id ${id}` }
    }

    clearTimeout(entry.timer)
    this.alarms.delete(id)
    log.info(`Cancelled alarm ${id}`)
    this.notify()
    return { success: true }
  }

  armedAlarmIds(): readonly string[] {
    return [...this.alarms.keys()]
  }

  getArmedAlarm(id: string): ArmedAlarm | null {
    const entry = this.alarms.get(id)
    return entry ? { ...entry.alarm, instant: new Date(entry.alarm.instant) } : null
  }

  subscribe(listener: ArmedAlarmsListener): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  /**
   * Stop every timer without firing or notifying
   */
  dispose(): void {
    for (const { timer } of this.alarms.values()) {
      clearTimeout(timer)
    }
    this.alarms.clear()
    this.listeners.clear()
  }

  private startTimer(alarm: ArmedAlarm): NodeJS.Timeout {
    const delay = alarm.instant.getTime() - this.now().getTime()
    return setTimeout(() => {
      if (delay > MAX_TIMER_DELAY_MS) {
        this.alarms.set(alarm.id, { alarm, timer: this.startTimer(alarm) })
        return
      }
      this.fire(alarm.id)
    }, Math.max(0, Math.min(delay, MAX_TIMER_DELAY_MS)))
  }

  private fire(id: string): void {
    const entry = this.alarms.get(id)
    if (!entry) {
      return
    }

    this.alarms.delete(id)
    log.info(`Alarm ${id} fired`, entry.alarm.metadata)
    this.notify()
    try {
      this.onFire(entry.alarm)
    } catch (error) {
      log.error(`Fire handler failed for alarm ${id}`, error)
    }
  }

  private notify(): void {
    const ids = this.armedAlarmIds()
    for (const listener of this.listeners) {
      try {
        listener(ids)
      } catch (error) {
        log.error('Armed alarms listener failed', error)
      }
    }
  }
}
