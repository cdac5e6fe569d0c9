import { loadConfig, type AppConfig } from '@/config'
import { alarmError } from '@/errors'
import { createLogger, setLogLevel } from '@/logger'
import { AlarmRetimingCoordinator } from '@/services/alarm-coordinator'
import { TimerAlarmScheduler, type ArmedAlarm } from '@/services/alarm-scheduler'
import { GeolocationService } from '@/services/geolocation'
import { LocationStore, type AddLocationResult, type NewLocation } from '@/services/location-store'
import { FileSettingsStore } from '@/services/settings-store'
import { SunriseService } from '@/services/sunrise-service'
import type {
  CoordinatorSnapshot,
  LocationProvider,
  OperationResult,
  SettingsStore,
  SnapshotListener,
  TimeService,
  TimingPolicy
} from '@/types'

const log = createLogger('app')

/**
 * How often a repeating alarm that failed to re-arm is tried again
 */
export const MAINTENANCE_INTERVAL_MS = 12 * 60 * 60 * 1000

export interface SunriseAlarmAppOptions {
  config?: AppConfig
  timeService?: TimeService
  settings?: SettingsStore
  locationProvider?: LocationProvider
  requestAlarmPermission?: () => Promise<boolean>
}

/**
 * Main application class that coordinates all the services
 */
export class SunriseAlarmApp {
  readonly config: AppConfig
  readonly locations: LocationStore
  readonly scheduler: TimerAlarmScheduler
  readonly coordinator: AlarmRetimingCoordinator
  private readonly geolocation: GeolocationService | null
  private maintenanceInterval: ReturnType<typeof setInterval> | null = null
  private retimePending = false

  constructor(options: SunriseAlarmAppOptions = {}) {
    this.config = options.config ?? loadConfig()
    setLogLevel(this.config.logLevel)

    const settings = options.settings ?? new FileSettingsStore(this.config.settingsFile)
    const timeService = options.timeService ?? new SunriseService({
      apiUrl: this.config.apiUrl,
      timeoutMs: this.config.fetchTimeoutMs
    })

    this.locations = new LocationStore(settings)
    this.scheduler = new TimerAlarmScheduler({
      requestPermission: options.requestAlarmPermission,
      onFire: (alarm) => {
        void this.handleAlarmFired(alarm)
      }
    })
    this.coordinator = new AlarmRetimingCoordinator({
      timeService,
      scheduler: this.scheduler,
      settings,
      testAlarmDelaySeconds: this.config.testAlarmDelaySeconds
    })
    this.geolocation = options.locationProvider ? new GeolocationService(options.locationProvider) : null
  }

  /**
   * Load saved state and pick up the alarm armed by a previous run
   */
  async start(): Promise<CoordinatorSnapshot> {
    log.info('🌅 Starting sunrise alarm...')

    const authorized = await this.scheduler.requestAuthorization()
    if (!authorized) {
      log.warn('Alarm scheduling is not authorized')
    }

    await this.locations.load()
    const restored = await this.coordinator.restore()
    if (!restored.success) {
      log.warn(`Could not restore alarm: ${restored.error.message}`)
      this.retimePending = true
    }

    // A refresh while armed would re-arm for tomorrow and skip a restored alarm due today
    const { state, sunTimes } = this.coordinator.getSnapshot()
    if (this.locations.getSelectedLocation() && state !== 'armed' && sunTimes === null) {
      const refreshed = await this.coordinator.refresh()
      if (!refreshed.success) {
        log.warn(`Could not load sun times: ${refreshed.error.message}`)
      }
    }

    this.startMaintenanceLoop()
    log.info('✅ Sunrise alarm started')
    return this.coordinator.getSnapshot()
  }

  async stop(): Promise<void> {
    this.stopMaintenanceLoop()
    await this.coordinator.settled()
    this.coordinator.dispose()
    this.scheduler.dispose()
  }

  getSnapshot(): CoordinatorSnapshot {
    return this.coordinator.getSnapshot()
  }

  onChange(listener: SnapshotListener): () => void {
    return this.coordinator.subscribe(listener)
  }

  async enableAlarm(): Promise<OperationResult> {
    const result = await this.coordinator.activateSelected()
    if (result.success) {
      this.retimePending = false
    }
    return result
  }

  disableAlarm(): Promise<OperationResult> {
    this.retimePending = false
    return this.coordinator.cancel()
  }

  /**
   * Retry after a displayed error
   */
  retry(): Promise<OperationResult> {
    return this.coordinator.refresh()
  }

  scheduleTestAlarm(delaySeconds?: number): Promise<OperationResult> {
    return this.coordinator.scheduleTestAlarm(delaySeconds)
  }

  addLocation(input: NewLocation): Promise<AddLocationResult> {
    return this.locations.addLocation(input)
  }

  async addCurrentLocation(name?: string): Promise<AddLocationResult> {
    if (!this.geolocation) {
      return { success: false, error: alarmError('LOCATION_UNAVAILABLE', 'Location services are not available') }
    }
    return this.locations.addCurrentLocation(this.geolocation, name)
  }

  async deleteLocation(id: string): Promise<boolean> {
    return this.locations.deleteLocation(id)
  }

  /**
   * Switch location; an armed sunrise alarm is re-armed for the new place
   */
  async selectLocation(id: string): Promise<OperationResult | null> {
    const selected = await this.locations.selectLocation(id)
    if (!selected) {
      return null
    }
    return this.hasArmedSunriseAlarm() ? this.coordinator.activateSelected() : this.coordinator.refresh()
  }

  /**
   * Change when to wake; an armed sunrise alarm is re-armed with the new timing
   */
  async setTimingPolicy(policy: TimingPolicy): Promise<OperationResult | null> {
    await this.locations.updateTimingPolicy(policy)
    return this.hasArmedSunriseAlarm() ? this.coordinator.activateSelected() : null
  }

  async setAutoRepeat(enabled: boolean): Promise<void> {
    await this.locations.updateAutoRepeat(enabled)
  }

  private hasArmedSunriseAlarm(): boolean {
    const { alarm } = this.coordinator.getSnapshot()
    return alarm !== null && !alarm.isTest
  }

  /**
   * The fired alarm has left the scheduler; arm the next morning's one.
   * Test alarms never repeat.
   */
  private async handleAlarmFired(fired: ArmedAlarm): Promise<void> {
    const { alarm } = this.coordinator.getSnapshot()
    if (alarm && alarm.id === fired.id && alarm.isTest) {
      log.info('Test alarm fired')
      return
    }

    await this.coordinator.settled()
    await this.retime()
  }

  private async retime(): Promise<void> {
    const result = await this.coordinator.retimeForNextDay()
    this.retimePending = !result.success
    if (!result.success) {
      log.error(`Failed to reschedule alarm: ${result.error.message}`)
    }
  }

  /**
   * Retry a failed re-arm every few hours until the repeating alarm is armed again
   */
  private startMaintenanceLoop(): void {
    this.stopMaintenanceLoop()
    this.maintenanceInterval = setInterval(() => {
      if (this.retimePending && this.coordinator.getSnapshot().state !== 'armed') {
        log.info('Retrying the repeating alarm')
        void this.retime()
      }
    }, MAINTENANCE_INTERVAL_MS)
  }

  private stopMaintenanceLoop(): void {
    if (this.maintenanceInterval) {
      clearInterval(this.maintenanceInterval)
      this.maintenanceInterval = null
    }
  }
}
