import { randomUUID } from 'node:crypto'
import { z } from 'zod'
import type { AlarmError, SavedLocation, SettingsStore, TimingPolicy } from '@/types'
import { alarmError } from '@/errors'
import { createLogger } from '@/logger'
import { CURRENT_LOCATION_NAME, isValidCoordinate, type GeolocationService } from './geolocation'
import { DEFAULT_TIMING_POLICY, isTimingPolicy } from './sun-times-resolver'

const log = createLogger('location-store')

export const DEFAULT_AUTO_REPEAT = true

// Locations closer than this (in degrees on both axes) count as the same place
const SAME_PLACE_DEGREES = 0.001

export const savedLocationSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180),
  isSelected: z.boolean()
})

const savedLocationsSchema = z.array(savedLocationSchema)

// Values written by earlier releases
const LEGACY_POLICY_VALUES = new Map<string, TimingPolicy>([
  ['Before Sunrise', 'civilDawn'],
  ['After Sunrise', 'afterSunrise'],
  ['Nautical Dawn', 'nauticalDawn'],
  ['Civil Dawn', 'civilDawn'],
  ['Sunrise', 'atSunrise']
])

/**
 * Parse a stored timing policy, accepting legacy values
 */
export function parseTimingPolicy(value: string): TimingPolicy | null {
  if (isTimingPolicy(value)) {
    return value
  }
  return LEGACY_POLICY_VALUES.get(value) ?? null
}

export async function readSavedLocations(settings: SettingsStore): Promise<SavedLocation[]> {
  const stored = await settings.get('savedLocations')
  if (stored === null) {
    return []
  }

  try {
    const parsed = savedLocationsSchema.safeParse(JSON.parse(stored))
    if (parsed.success) {
      return parsed.data
    }
    log.warn('Ignoring malformed saved locations', parsed.error.issues)
  } catch (error) {
    log.warn('Failed to load saved locations:', error)
  }
  return []
}

export async function readSelectedLocation(settings: SettingsStore): Promise<SavedLocation | null> {
  const locations = await readSavedLocations(settings)
  return locations.find(location => location.isSelected) ?? null
}

/**
 * Make `location` the only selected saved location, saving it first if it is new
 */
export async function saveSelectedLocation(settings: SettingsStore, location: SavedLocation): Promise<void> {
  const locations = await readSavedLocations(settings)
  const known = locations.some(saved => saved.id === location.id)
  const next = (known ? locations : [...locations, location]).map(saved => ({
    ...saved,
    isSelected: saved.id === location.id
  }))
  await settings.set('savedLocations', JSON.stringify(next))
}

/**
 * Read the timing policy, rewriting legacy values in their current form
 */
export async function readTimingPolicy(settings: SettingsStore): Promise<TimingPolicy> {
  const stored = await settings.get('timingPolicy')
  if (stored === null) {
    return DEFAULT_TIMING_POLICY
  }

  const policy = parseTimingPolicy(stored)
  if (policy === null) {
    log.warn(`Unknown timing policy "${stored}", using ${DEFAULT_TIMING_POLICY}`)
    return DEFAULT_TIMING_POLICY
  }
  if (policy !== stored) {
    log.info(`Migrating timing policy "${stored}" to ${policy}`)
    await settings.set('timingPolicy', policy)
  }
  return policy
}

export async function readAutoRepeat(settings: SettingsStore): Promise<boolean> {
  const stored = await settings.get('autoRepeat')
  if (stored === 'true') return true
  if (stored === 'false') return false
  return DEFAULT_AUTO_REPEAT
}

export interface NewLocation {
  name: string
  latitude: number
  longitude: number
}

export type AddLocationResult =
  | { success: true; location: SavedLocation }
  | { success: false; error: AlarmError }

/**
 * Saved locations and alarm preferences, persisted on every change
 */
export class LocationStore {
  private locations: SavedLocation[] = []
  private timingPolicy: TimingPolicy = DEFAULT_TIMING_POLICY
  private autoRepeat = DEFAULT_AUTO_REPEAT

  constructor(
    private readonly settings: SettingsStore,
    private readonly generateId: () => string = () => randomUUID()
  ) {}

  async load(): Promise<void> {
    this.locations = await readSavedLocations(this.settings)
    this.timingPolicy = await readTimingPolicy(this.settings)
    this.autoRepeat = await readAutoRepeat(this.settings)
  }

  getLocations(): SavedLocation[] {
    return this.locations.map(location => ({ ...location }))
  }

  getSelectedLocation(): SavedLocation | null {
    const selected = this.locations.find(location => location.isSelected)
    return selected ? { ...selected } : null
  }

  getTimingPolicy(): TimingPolicy {
    return this.timingPolicy
  }

  isAutoRepeatEnabled(): boolean {
    return this.autoRepeat
  }

  /**
   * Add a manually entered location. The first saved location becomes the selected one.
   * A location at the same place as an existing one returns the existing entry.
   */
  async addLocation(input: NewLocation): Promise<AddLocationResult> {
    if (!isValidCoordinate(input.latitude, input.longitude)) {
      return { success: false, error: alarmError('INVALID_COORDINATES', 'Please enter valid coordinates') }
    }
    const name = input.name.trim() || `${input.latitude.toFixed(4)}, ${input.longitude.toFixed(4)}`

    const existing = this.locations.find(location =>
      Math.abs(location.latitude - input.latitude) < SAME_PLACE_DEGREES &&
      Math.abs(location.longitude - input.longitude) < SAME_PLACE_DEGREES
    )
    if (existing) {
      return { success: true, location: { ...existing } }
    }

    const location: SavedLocation = {
      id: this.generateId(),
      name,
      latitude: input.latitude,
      longitude: input.longitude,
      isSelected: this.locations.length === 0
    }

    this.locations = [...this.locations, location]
    await this.saveLocations()
    return { success: true, location: { ...location } }
  }

  /**
   * Add the device's current position under `name`
   */
  async addCurrentLocation(
    geolocation: GeolocationService,
    name: string = CURRENT_LOCATION_NAME
  ): Promise<AddLocationResult> {
    const result = await geolocation.getCurrentPosition()
    if (!result.success) {
      return result
    }
    return this.addLocation({ name, ...result.position })
  }

  async deleteLocation(id: string): Promise<boolean> {
    const remaining = this.locations.filter(location => location.id !== id)
    if (remaining.length === this.locations.length) {
      return false
    }

    this.locations = remaining
    await this.saveLocations()
    return true
  }

  /**
   * Make `id` the only selected location
   */
  async selectLocation(id: string): Promise<boolean> {
    if (!this.locations.some(location => location.id === id)) {
      return false
    }

    this.locations = this.locations.map(location => ({ ...location, isSelected: location.id === id }))
    await this.saveLocations()
    return true
  }

  async updateTimingPolicy(policy: TimingPolicy): Promise<void> {
    this.timingPolicy = policy
    await this.settings.set('timingPolicy', policy)
  }

  async updateAutoRepeat(enabled: boolean): Promise<void> {
    this.autoRepeat = enabled
    await this.settings.set('autoRepeat', String(enabled))
  }

  private async saveLocations(): Promise<void> {
    await this.settings.set('savedLocations', JSON.stringify(this.locations))
  }
}
