import type { AlarmError, AlarmErrorCode } from '@/types'

const RECOVERABLE: Record<AlarmErrorCode, boolean> = {
  LOCATION_UNAVAILABLE: false,
  NETWORK_FAILURE: true,
  TIMEOUT: true,
  MALFORMED_RESPONSE: true,
  SCHEDULER_REJECTED: false,
  INVALID_COORDINATES: false
}

export function alarmError(code: AlarmErrorCode, message: string): AlarmError {
  return { code, message, recoverable: RECOVERABLE[code] }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
