export type * from './types'
export { loadConfig, type AppConfig } from './config'
export { alarmError } from './errors'
export { createLogger, setLogLevel, type LogLevel, type Logger } from './logger'
export { SunriseAlarmApp, type SunriseAlarmAppOptions } from './main'
export {
  AlarmRetimingCoordinator,
  DEFAULT_TEST_ALARM_DELAY_SECONDS,
  type AlarmCoordinatorOptions
} from './services/alarm-coordinator'
export {
  TimerAlarmScheduler,
  type ArmedAlarm,
  type AuthorizationState,
  type TimerAlarmSchedulerOptions
} from './services/alarm-scheduler'
export { addDays, formatLocalDate, tomorrow } from './services/calendar'
export {
  GeolocationService,
  formatCoordinates,
  isValidCoordinate,
  type CurrentPositionResult
} from './services/geolocation'
export {
  LocationStore,
  parseTimingPolicy,
  type AddLocationResult,
  type NewLocation
} from './services/location-store'
export { FileSettingsStore, MemorySettingsStore } from './services/settings-store'
export {
  AFTER_SUNRISE_OFFSET_MINUTES,
  TIMING_POLICIES,
  TIMING_POLICY_INFO,
  createSunTimes,
  isBeforeSunrise,
  resolveAlarmTime,
  validateSunTimes,
  type TimingPolicyInfo
} from './services/sun-times-resolver'
export {
  SunriseService,
  parseIsoTimestamp,
  parseSunTimesResponse,
  type SunriseServiceOptions
} from './services/sunrise-service'
