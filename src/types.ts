// TypeScript type definitions for the sunrise alarm

/**
 * When to wake relative to sunrise
 */
export type TimingPolicy = 'nauticalDawn' | 'civilDawn' | 'atSunrise' | 'afterSunrise'

/**
 * All sun times for one local calendar day at one coordinate.
 * Instants are strictly ascending in declaration order.
 */
export interface SunTimes {
  readonly date: string // YYYY-MM-DD in the local calendar
  readonly nauticalDawnStart: Date
  readonly civilDawnStart: Date
  readonly sunriseInstant: Date
  readonly solarNoonInstant: Date
  readonly sunsetInstant: Date
  readonly civilDuskEnd: Date
  readonly nauticalDuskEnd: Date
}

export type SunTimeField = Exclude<keyof SunTimes, 'date'>

export interface SavedLocation {
  id: string
  name: string
  latitude: number
  longitude: number
  isSelected: boolean
}

/**
 * Presentation metadata handed to the scheduler with every armed alarm
 */
export interface AlarmMetadata {
  isBefore: boolean
  locationName: string
}

export interface ScheduledAlarm {
  id: string
  targetInstant: Date
  locationLabel: string
  policy: TimingPolicy
  autoRepeatEnabled: boolean
  isBefore: boolean
  isTest: boolean
  location: SavedLocation | null // null for a test alarm without a saved location
}

export type AlarmErrorCode =
  | 'LOCATION_UNAVAILABLE'
  | 'NETWORK_FAILURE'
  | 'TIMEOUT'
  | 'MALFORMED_RESPONSE'
  | 'SCHEDULER_REJECTED'
  | 'INVALID_COORDINATES'

export interface AlarmError {
  code: AlarmErrorCode
  message: string
  recoverable: boolean // retry through refresh()
}

export type SunTimesResult =
  | { success: true; sunTimes: SunTimes }
  | { success: false; error: AlarmError }

export type SchedulerResult =
  | { success: true }
  | { success: false; reason: string }

export type CoordinatorState = 'idle' | 'resolving' | 'armed'

/**
 * Observable coordinator state exposed to the UI layer
 */
export interface CoordinatorSnapshot {
  state: CoordinatorState
  sunTimes: SunTimes | null
  alarm: ScheduledAlarm | null
  lastError: AlarmError | null
}

export type SnapshotListener = (snapshot: CoordinatorSnapshot) => void

export type OperationResult =
  | { success: true; snapshot: CoordinatorSnapshot }
  | { success: false; error: AlarmError; snapshot: CoordinatorSnapshot }

export interface TimeService {
  fetchSunTimes(latitude: number, longitude: number, date: Date): Promise<SunTimesResult>
}

export type ArmedAlarmsListener = (armedIds: readonly string[]) => void

export interface AlarmScheduler {
  arm(id: string, instant: Date, metadata: AlarmMetadata): Promise<SchedulerResult>
  cancel(id: string): Promise<SchedulerResult>
  armedAlarmIds(): readonly string[]
  /**
   * Receives the full armed id list after every change; returns an unsubscribe function
   */
  subscribe(listener: ArmedAlarmsListener): () => void
}

export type SettingsKey = 'savedLocations' | 'timingPolicy' | 'autoRepeat' | 'armedAlarm'

/**
 * String key-value persistence, last write wins per key
 */
export interface SettingsStore {
  get(key: SettingsKey): Promise<string | null>
  set(key: SettingsKey, value: string): Promise<void>
  remove(key: SettingsKey): Promise<void>
}

export interface Position {
  latitude: number
  longitude: number
}

export interface PositionError {
  code: number // 1 permission denied, 2 unavailable, 3 timeout
  message: string
}

export type PositionResult =
  | { success: true; position: Position }
  | { success: false; error: PositionError }

export interface LocationProvider {
  getCurrentPosition(timeoutMs: number): Promise<PositionResult>
}
