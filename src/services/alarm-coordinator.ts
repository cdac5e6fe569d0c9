import { randomUUID } from 'node:crypto'
import { z } from 'zod'
import type {
  AlarmError,
  AlarmErrorCode,
  AlarmMetadata,
  AlarmScheduler,
  CoordinatorSnapshot,
  CoordinatorState,
  OperationResult,
  SavedLocation,
  ScheduledAlarm,
  SchedulerResult,
  SettingsStore,
  SnapshotListener,
  SunTimes,
  SunTimesResult,
  TimeService,
  TimingPolicy
} from '@/types'
import { alarmError, describeError } from '@/errors'
import { createLogger } from '@/logger'
import { tomorrow } from './calendar'
import {
  readAutoRepeat,
  readSelectedLocation,
  readTimingPolicy,
  saveSelectedLocation,
  savedLocationSchema
} from './location-store'
import { DEFAULT_TIMING_POLICY, isBeforeSunrise, resolveAlarmTime } from './sun-times-resolver'

const log = createLogger('alarm-coordinator')

export const DEFAULT_TEST_ALARM_DELAY_SECONDS = 10
export const TEST_LOCATION_NAME = 'Test Location'

const scheduledAlarmSchema = z.object({
  id: z.string().min(1),
  targetInstant: z.coerce.date(),
  locationLabel: z.string(),
  policy: z.enum(['nauticalDawn', 'civilDawn', 'atSunrise', 'afterSunrise']),
  autoRepeatEnabled: z.boolean(),
  isBefore: z.boolean(),
  isTest: z.boolean(),
  location: savedLocationSchema.nullable()
})

export interface AlarmCoordinatorOptions {
  timeService: TimeService
  scheduler: AlarmScheduler
  settings: SettingsStore
  now?: () => Date
  generateId?: () => string
  testAlarmDelaySeconds?: number
}

/**
 * Owns the single alarm slot: fetches tomorrow's sun times, resolves the wake time
 * and keeps exactly one alarm armed with the scheduler.
 *
 * Operations run one at a time in call order. Every failure is reported through the
 * returned result and `lastError`; the coordinator is left in its previous stable state.
 */
export class AlarmRetimingCoordinator {
  private state: CoordinatorState = 'idle'
  private sunTimes: SunTimes | null = null
  private alarm: ScheduledAlarm | null = null
  private lastError: AlarmError | null = null

  private readonly listeners = new Set<SnapshotListener>()
  private queue: Promise<unknown> = Promise.resolve()
  private unsubscribeScheduler: (() => void) | null

  private readonly timeService: TimeService
  private readonly scheduler: AlarmScheduler
  private readonly settings: SettingsStore
  private readonly now: () => Date
  private readonly generateId: () => string
  private readonly testAlarmDelaySeconds: number

  constructor(options: AlarmCoordinatorOptions) {
    this.timeService = options.timeService
    this.scheduler = options.scheduler
    this.settings = options.settings
    this.now = options.now ?? (() => new Date())
    this.generateId = options.generateId ?? (() => randomUUID())
    this.testAlarmDelaySeconds = options.testAlarmDelaySeconds ?? DEFAULT_TEST_ALARM_DELAY_SECONDS

    this.unsubscribeScheduler = this.scheduler.subscribe(() => {
      void this.enqueue('SCHEDULER_REJECTED', () => this.reconcileWithScheduler())
    })
  }

  getSnapshot(): CoordinatorSnapshot {
    return {
      state: this.state,
      sunTimes: this.sunTimes,
      alarm: this.alarm ? { ...this.alarm, targetInstant: new Date(this.alarm.targetInstant) } : null,
      lastError: this.lastError ? { ...this.lastError } : null
    }
  }

  subscribe(listener: SnapshotListener): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  /**
   * Resolves once every operation queued so far has finished
   */
  async settled(): Promise<void> {
    await this.queue
  }

  /**
   * Pick up the alarm armed by a previous run. One the scheduler lost while it was
   * still in the future is armed again under its own id; a repeating alarm whose
   * time has passed (fired while nothing was running) is re-armed for the next day.
   */
  restore(): Promise<OperationResult> {
    return this.enqueue('SCHEDULER_REJECTED', async () => {
      const stored = await this.readArmedAlarm()
      if (!stored) {
        return this.succeed(this.state)
      }

      if (this.scheduler.armedAlarmIds().includes(stored.id)) {
        log.info(`Restored alarm ${stored.id} for ${stored.targetInstant.toISOString()}`)
        this.alarm = stored
        return this.succeed('armed')
      }

      if (stored.targetInstant.getTime() > this.now().getTime()) {
        const rearmed = await this.armWithScheduler(stored)
        if (rearmed.success) {
          log.info(`Re-armed alarm ${stored.id} for ${stored.targetInstant.toISOString()}`)
          this.alarm = stored
          return this.succeed('armed')
        }
        await this.clearArmedAlarm()
        return this.fail(alarmError('SCHEDULER_REJECTED', `Failed to schedule alarm: ${rearmed.reason}`), 'idle')
      }

      log.info(`Alarm ${stored.id} has passed, clearing it`)
      await this.clearArmedAlarm()
      if (stored.autoRepeatEnabled && !stored.isTest) {
        return this.runRetime()
      }
      return this.succeed(this.state)
    })
  }

  /**
   * Arm tomorrow's alarm for `location` under `policy`. Once armed, both become the
   * saved selection that later retimes read.
   */
  activate(location: SavedLocation, policy: TimingPolicy): Promise<OperationResult> {
    return this.enqueue('NETWORK_FAILURE', async () => {
      const autoRepeat = await this.readSetting(() => readAutoRepeat(this.settings), true)
      const result = await this.runActivate(location, policy, autoRepeat)
      if (result.success) {
        await this.saveSelection(location, policy)
      }
      return result
    })
  }

  /**
   * Arm tomorrow's alarm for the saved selection
   */
  activateSelected(): Promise<OperationResult> {
    return this.enqueue('NETWORK_FAILURE', async () => {
      const location = await this.readSetting(() => readSelectedLocation(this.settings), null)
      if (!location) {
        return this.fail(alarmError('LOCATION_UNAVAILABLE', 'Please select a location first'), this.state)
      }
      const policy = await this.readSetting(() => readTimingPolicy(this.settings), DEFAULT_TIMING_POLICY)
      const autoRepeat = await this.readSetting(() => readAutoRepeat(this.settings), true)
      return this.runActivate(location, policy, autoRepeat)
    })
  }

  cancel(): Promise<OperationResult> {
    return this.enqueue('SCHEDULER_REJECTED', async () => {
      const current = this.alarm
      if (!current) {
        return this.succeed('idle')
      }

      const result = await this.cancelWithScheduler(current.id)
      if (!result.success) {
        log.warn(`Alarm ${current.id} was already gone: ${result.reason}`)
      }
      this.alarm = null
      await this.clearArmedAlarm()
      return this.succeed('idle')
    })
  }

  /**
   * Re-derive and re-arm the next morning's alarm from the saved selection.
   * Does nothing while auto-repeat is off.
   */
  retimeForNextDay(): Promise<OperationResult> {
    return this.enqueue('NETWORK_FAILURE', () => this.runRetime())
  }

  /**
   * Re-arm the current alarm with fresh sun times, or refresh the displayed
   * sun times for the selected location when nothing is armed
   */
  refresh(): Promise<OperationResult> {
    return this.enqueue('NETWORK_FAILURE', async () => {
      const current = this.alarm
      if (current && current.location && !current.isTest) {
        return this.runActivate(current.location, current.policy, current.autoRepeatEnabled)
      }

      const location = await this.readSetting(() => readSelectedLocation(this.settings), null)
      if (!location) {
        return this.fail(alarmError('LOCATION_UNAVAILABLE', 'Please select a location first'), this.state)
      }

      const prior = this.state
      this.setState('resolving')
      const fetched = await this.fetchSunTimes(location)
      if (!fetched.success) {
        return this.fail(fetched.error, prior)
      }
      this.sunTimes = fetched.sunTimes
      return this.succeed(prior)
    })
  }

  /**
   * Arm an alarm `delaySeconds` from now without fetching sun times
   */
  scheduleTestAlarm(delaySeconds: number = this.testAlarmDelaySeconds): Promise<OperationResult> {
    return this.enqueue('SCHEDULER_REJECTED', async () => {
      const location = await this.readSetting(() => readSelectedLocation(this.settings), null)
      const policy = await this.readSetting(() => readTimingPolicy(this.settings), DEFAULT_TIMING_POLICY)

      const next: ScheduledAlarm = {
        id: this.generateId(),
        targetInstant: new Date(this.now().getTime() + delaySeconds * 1000),
        locationLabel: location?.name ?? TEST_LOCATION_NAME,
        policy,
        autoRepeatEnabled: false,
        isBefore: false,
        isTest: true,
        location
      }
      return this.replaceAlarm(next, this.state)
    })
  }

  /**
   * Stop observing the scheduler
   */
  dispose(): void {
    if (this.unsubscribeScheduler) {
      this.unsubscribeScheduler()
      this.unsubscribeScheduler = null
    }
    this.listeners.clear()
  }

  private async runRetime(): Promise<OperationResult> {
    const autoRepeat = await this.readSetting(() => readAutoRepeat(this.settings), false)
    if (!autoRepeat) {
      log.debug('Auto-repeat is off, not retiming')
      return { success: true, snapshot: this.getSnapshot() }
    }

    const location = await this.readSetting(() => readSelectedLocation(this.settings), null)
    if (!location) {
      return this.fail(alarmError('LOCATION_UNAVAILABLE', 'No location selected for the repeating alarm'), this.state)
    }
    const policy = await this.readSetting(() => readTimingPolicy(this.settings), DEFAULT_TIMING_POLICY)
    return this.runActivate(location, policy, true)
  }

  private async runActivate(
    location: SavedLocation,
    policy: TimingPolicy,
    autoRepeatEnabled: boolean
  ): Promise<OperationResult> {
    const prior = this.state
    this.setState('resolving')

    const fetched = await this.fetchSunTimes(location)
    if (!fetched.success) {
      log.warn(`Could not fetch sun times for ${location.name}: ${fetched.error.message}`)
      return this.fail(fetched.error, prior)
    }
    this.sunTimes = fetched.sunTimes

    const next: ScheduledAlarm = {
      id: this.generateId(),
      targetInstant: resolveAlarmTime(fetched.sunTimes, policy),
      locationLabel: location.name,
      policy,
      autoRepeatEnabled,
      isBefore: isBeforeSunrise(policy),
      isTest: false,
      location: { ...location }
    }
    return this.replaceAlarm(next, prior)
  }

  /**
   * Cancel whatever is armed, then arm `next`. When the scheduler refuses `next`,
   * the previous alarm is put back if it has not passed yet.
   */
  private async replaceAlarm(next: ScheduledAlarm, prior: CoordinatorState): Promise<OperationResult> {
    const previous = this.alarm
    if (previous) {
      const cancelled = await this.cancelWithScheduler(previous.id)
      if (!cancelled.success) {
        log.warn(`Previous alarm ${previous.id} was already gone: ${cancelled.reason}`)
      }
    }

    const armed = await this.armWithScheduler(next)
    if (!armed.success) {
      const error = alarmError('SCHEDULER_REJECTED', `Failed to schedule alarm: ${armed.reason}`)
      log.error(error.message)

      if (previous && previous.targetInstant.getTime() > this.now().getTime()) {
        const restored = await this.armWithScheduler(previous)
        if (restored.success) {
          return this.fail(error, prior)
        }
        log.error(`Could not restore alarm ${previous.id}: ${restored.reason}`)
      }

      if (previous) {
        this.alarm = null
        await this.clearArmedAlarm()
      }
      return this.fail(error, 'idle')
    }

    this.alarm = next
    await this.saveArmedAlarm(next)
    log.info(`Alarm ${next.id} armed for ${next.targetInstant.toISOString()} at ${next.locationLabel}`)
    return this.succeed('armed')
  }

  /**
   * Drop the armed alarm once the scheduler no longer lists it (fired or dismissed elsewhere)
   */
  private async reconcileWithScheduler(): Promise<OperationResult> {
    const current = this.alarm
    if (this.state !== 'armed' || !current) {
      return { success: true, snapshot: this.getSnapshot() }
    }
    if (this.scheduler.armedAlarmIds().includes(current.id)) {
      return { success: true, snapshot: this.getSnapshot() }
    }

    log.info(`Alarm ${current.id} is no longer armed`)
    this.alarm = null
    await this.clearArmedAlarm()
    this.setState('idle')
    return { success: true, snapshot: this.getSnapshot() }
  }

  private async fetchSunTimes(location: SavedLocation): Promise<SunTimesResult> {
    try {
      return await this.timeService.fetchSunTimes(location.latitude, location.longitude, tomorrow(this.now()))
    } catch (error) {
      return {
        success: false,
        error: alarmError('NETWORK_FAILURE', `Failed to fetch sun times: ${describeError(error)}`)
      }
    }
  }

  private async armWithScheduler(alarm: ScheduledAlarm): Promise<SchedulerResult> {
    const metadata: AlarmMetadata = { isBefore: alarm.isBefore, locationName: alarm.locationLabel }
    try {
      return await this.scheduler.arm(alarm.id, alarm.targetInstant, metadata)
    } catch (error) {
      return { success: false, reason: describeError(error) }
    }
  }

  private async cancelWithScheduler(id: string): Promise<SchedulerResult> {
    try {
      return await this.scheduler.cancel(id)
    } catch (error) {
      return { success: false, reason: describeError(error) }
    }
  }

  private async readSetting<T>(read: () => Promise<T>, fallback: T): Promise<T> {
    try {
      return await read()
    } catch (error) {
      log.warn('Failed to read settings', error)
      return fallback
    }
  }

  private async readArmedAlarm(): Promise<ScheduledAlarm | null> {
    const stored = await this.readSetting(() => this.settings.get('armedAlarm'), null)
    if (stored === null) {
      return null
    }

    try {
      const parsed = scheduledAlarmSchema.safeParse(JSON.parse(stored))
      if (parsed.success) {
        return parsed.data
      }
      log.warn('Ignoring malformed armed alarm record', parsed.error.issues)
    } catch (error) {
      log.warn('Ignoring unreadable armed alarm record', error)
    }
    return null
  }

  private async saveSelection(location: SavedLocation, policy: TimingPolicy): Promise<void> {
    try {
      await saveSelectedLocation(this.settings, location)
      await this.settings.set('timingPolicy', policy)
    } catch (error) {
      log.error('Failed to save alarm selection', error)
    }
  }

  private async saveArmedAlarm(alarm: ScheduledAlarm): Promise<void> {
    try {
      await this.settings.set('armedAlarm', JSON.stringify(alarm))
    } catch (error) {
      log.error('Failed to save armed alarm', error)
    }
  }

  private async clearArmedAlarm(): Promise<void> {
    try {
      await this.settings.remove('armedAlarm')
    } catch (error) {
      log.error('Failed to clear armed alarm', error)
    }
  }

  private enqueue(
    fallbackCode: AlarmErrorCode,
    operation: () => Promise<OperationResult>
  ): Promise<OperationResult> {
    const run = this.queue.then(async () => {
      const prior = this.state === 'resolving' ? (this.alarm ? 'armed' : 'idle') : this.state
      try {
        return await operation()
      } catch (error) {
        log.error('Unexpected failure', error)
        return this.fail(alarmError(fallbackCode, describeError(error)), prior)
      }
    })
    this.queue = run
    return run
  }

  private succeed(state: CoordinatorState): OperationResult {
    this.lastError = null
    this.setState(state)
    return { success: true, snapshot: this.getSnapshot() }
  }

  private fail(error: AlarmError, state: CoordinatorState): OperationResult {
    this.lastError = error
    this.setState(state)
    return { success: false, error, snapshot: this.getSnapshot() }
  }

  private setState(state: CoordinatorState): void {
    this.state = state
    const snapshot = this.getSnapshot()
    for (const listener of this.listeners) {
      try {
        listener(snapshot)
      } catch (error) {
        log.error('Snapshot listener failed', error)
      }
    }
  }
}
