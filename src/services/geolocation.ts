import type { AlarmError, LocationProvider, Position } from '@/types'
import { alarmError, describeError } from '@/errors'
import { createLogger } from '@/logger'

const log = createLogger('geolocation')

export const CURRENT_LOCATION_NAME = 'Current Location'

export type CurrentPositionResult =
  | { success: true; position: Position }
  | { success: false; error: AlarmError }

/**
 * Geolocation service for turning a device position fix into coordinates
 */
export class GeolocationService {
  constructor(
    private readonly provider: LocationProvider,
    private readonly timeoutMs: number = 15000
  ) {}

  /**
   * Ask the device for its current position
   */
  async getCurrentPosition(): Promise<CurrentPositionResult> {
    try {
      const result = await this.provider.getCurrentPosition(this.timeoutMs)

      if (!result.success) {
        const message = getGeolocationErrorMessage(result.error.code)
        log.warn(message, result.error.message)
        return { success: false, error: alarmError('LOCATION_UNAVAILABLE', message) }
      }

      const { latitude, longitude } = result.position
      if (!isValidCoordinate(latitude, longitude)) {
        return {
          success: false,
          error: alarmError('INVALID_COORDINATES', `Device reported invalid coordinates ${latitude}, ${longitude}`)
        }
      }

      return { success: true, position: { latitude, longitude } }
    } catch (error) {
      log.error('Location provider failed', error)
      return {
        success: false,
        error: alarmError('LOCATION_UNAVAILABLE', `Failed to get location: ${describeError(error)}`)
      }
    }
  }
}

/**
 * Get human-readable error message for position errors
 */
export function getGeolocationErrorMessage(code: number): string {
  switch (code) {
    case 1: // PERMISSION_DENIED
      return 'Location access denied by user'
    case 2: // POSITION_UNAVAILABLE
      return 'Location information is unavailable'
    case 3: // TIMEOUT
      return 'Location request timed out'
    default:
      return 'An unknown error occurred while retrieving location'
  }
}

/**
 * Validate location coordinates
 */
export function isValidCoordinate(latitude: number, longitude: number): boolean {
  return (
    Number.isFinite(latitude) &&
    Number.isFinite(longitude) &&
    latitude >= -90 &&
    latitude <= 90 &&
    longitude >= -180 &&
    longitude <= 180
  )
}

/**
 * Format coordinates for display, e.g. "47.61°N 122.33°W"
 */
export function formatCoordinates(latitude: number, longitude: number): string {
  const latDir = latitude >= 0 ? 'N' : 'S'
  const lonDir = longitude >= 0 ? 'E' : 'W'
  return `${Math.abs(latitude).toFixed(2)}°${latDir} ${Math.abs(longitude).toFixed(2)}°${lonDir}`
}
