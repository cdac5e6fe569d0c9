import { describe, test, expect, beforeEach, afterEach, vi } from 'vitest'
import type { AppConfig } from '@/config'
import { MAINTENANCE_INTERVAL_MS, SunriseAlarmApp } from '@/main'
import { MemorySettingsStore } from '@/services/settings-store'
import { FakeTimeService, mockDate, restoreDate } from './helpers'

const CONFIG: AppConfig = {
  apiUrl: 'http://localhost:8080/json',
  fetchTimeoutMs: 1000,
  settingsFile: 'unused/settings.json',
  testAlarmDelaySeconds: 10,
  logLevel: 'silent'
}

describe('Sunrise Alarm App', () => {
  let settings: MemorySettingsStore
  let timeService: FakeTimeService
  let apps: SunriseAlarmApp[]

  function createApp(requestAlarmPermission: () => Promise<boolean> = async () => true): SunriseAlarmApp {
    const app = new SunriseAlarmApp({ config: CONFIG, settings, timeService, requestAlarmPermission })
    apps.push(app)
    return app
  }

  async function startWithSeattle(): Promise<SunriseAlarmApp> {
    const app = createApp()
    await app.start()
    await app.addLocation({ name: 'Seattle, WA', latitude: 47.6062, longitude: -122.3321 })
    return app
  }

  beforeEach(() => {
    mockDate('2024-06-20T22:00:00Z')
    settings = new MemorySettingsStore()
    timeService = new FakeTimeService()
    apps = []
  })

  afterEach(async () => {
    for (const app of apps) {
      await app.stop()
    }
    restoreDate()
  })

  test('should start idle without saved locations', async () => {
    const snapshot = await createApp().start()

    expect(snapshot).toEqual({ state: 'idle', sunTimes: null, alarm: null, lastError: null })
    expect(timeService.requests).toEqual([])
  })

  test('should load sun times for the selected location on start', async () => {
    await settings.set(
      'savedLocations',
      JSON.stringify([{ id: 'home', name: 'Home', latitude: 10, longitude: 20, isSelected: true }])
    )

    const snapshot = await createApp().start()

    expect(snapshot.state).toBe('idle')
    expect(snapshot.sunTimes?.date).toBe('2024-06-21')
    expect(timeService.requests).toEqual([{ latitude: 10, longitude: 20, date: '2024-06-21' }])
  })

  test('should arm tomorrow morning for the selected location', async () => {
    const app = await startWithSeattle()

    const result = await app.enableAlarm()

    expect(result.snapshot.state).toBe('armed')
    expect(result.snapshot.alarm?.targetInstant).toEqual(new Date('2024-06-21T07:12:00Z'))
    expect(app.scheduler.armedAlarmIds()).toEqual([result.snapshot.alarm?.id])
  })

  test('should arm the next morning once the alarm fires', async () => {
    const app = await startWithSeattle()
    const first = await app.enableAlarm()

    await vi.advanceTimersByTimeAsync(9 * 60 * 60 * 1000 + 12 * 60 * 1000)

    await vi.waitFor(() => {
      expect(app.getSnapshot().alarm?.targetInstant).toEqual(new Date('2024-06-22T07:12:00Z'))
    })
    expect(timeService.requests.map(request => request.date)).toEqual(['2024-06-21', '2024-06-22'])
    expect(app.scheduler.armedAlarmIds()).toHaveLength(1)
    expect(app.scheduler.armedAlarmIds()).not.toContain(first.snapshot.alarm?.id)
  })

  test('should retry a failed re-arm on the maintenance tick', async () => {
    const app = await startWithSeattle()
    await app.enableAlarm()
    timeService.failWith('NETWORK_FAILURE', 'offline')

    await vi.advanceTimersByTimeAsync(9 * 60 * 60 * 1000 + 12 * 60 * 1000)
    await vi.waitFor(() => {
      expect(timeService.requests).toHaveLength(2)
      expect(app.getSnapshot().state).toBe('idle')
    })
    await app.coordinator.settled()
    expect(app.getSnapshot().lastError?.message).toBe('offline')

    await vi.advanceTimersByTimeAsync(3 * 60 * 60 * 1000)
    await vi.waitFor(() => {
      expect(app.getSnapshot().alarm?.targetInstant).toEqual(new Date('2024-06-22T07:12:00Z'))
    })
    expect(timeService.requests.map(request => request.date)).toEqual(['2024-06-21', '2024-06-22', '2024-06-22'])
    expect(app.scheduler.armedAlarmIds()).toHaveLength(1)
  })

  test('should not retry a failed re-arm once the alarm is disabled', async () => {
    const app = await startWithSeattle()
    await app.enableAlarm()
    timeService.failWith('NETWORK_FAILURE', 'offline')

    await vi.advanceTimersByTimeAsync(9 * 60 * 60 * 1000 + 12 * 60 * 1000)
    await vi.waitFor(() => {
      expect(timeService.requests).toHaveLength(2)
    })
    await app.coordinator.settled()
    await app.disableAlarm()

    await vi.advanceTimersByTimeAsync(2 * MAINTENANCE_INTERVAL_MS)
    await app.coordinator.settled()

    expect(timeService.requests).toHaveLength(2)
    expect(app.getSnapshot().state).toBe('idle')
    expect(app.scheduler.armedAlarmIds()).toEqual([])
  })

  test('should leave the maintenance tick alone while nothing needs retrying', async () => {
    const app = await startWithSeattle()

    await vi.advanceTimersByTimeAsync(2 * MAINTENANCE_INTERVAL_MS)
    await app.coordinator.settled()

    expect(timeService.requests).toEqual([])
    expect(vi.getTimerCount()).toBe(1)
    await app.stop()
    expect(vi.getTimerCount()).toBe(0)
  })

  test('should not repeat once auto-repeat is switched off', async () => {
    const app = await startWithSeattle()
    await app.setAutoRepeat(false)
    await app.enableAlarm()

    await vi.advanceTimersByTimeAsync(9 * 60 * 60 * 1000 + 12 * 60 * 1000)
    await vi.waitFor(() => {
      expect(app.getSnapshot().state).toBe('idle')
    })
    await app.coordinator.settled()

    expect(timeService.requests).toHaveLength(1)
    expect(app.scheduler.armedAlarmIds()).toEqual([])
  })

  test('should not repeat a test alarm', async () => {
    const app = await startWithSeattle()

    const result = await app.scheduleTestAlarm()
    expect(result.snapshot.alarm?.targetInstant).toEqual(new Date('2024-06-20T22:00:10Z'))

    await vi.advanceTimersByTimeAsync(10_000)
    await vi.waitFor(() => {
      expect(app.getSnapshot().state).toBe('idle')
    })
    await app.coordinator.settled()

    expect(timeService.requests).toEqual([])
    expect(app.scheduler.armedAlarmIds()).toEqual([])
  })

  test('should pick up an alarm from a previous run', async () => {
    const previous = await startWithSeattle()
    const armed = await previous.enableAlarm()
    await previous.stop()

    const app = createApp()
    const snapshot = await app.start()

    expect(snapshot.state).toBe('armed')
    expect(snapshot.alarm?.id).toBe(armed.snapshot.alarm?.id)
    expect(app.scheduler.armedAlarmIds()).toEqual([armed.snapshot.alarm?.id])
    expect(timeService.requests).toHaveLength(1)
  })

  test('should re-arm for a newly selected location', async () => {
    const app = await startWithSeattle()
    const london = await app.addLocation({ name: 'London, UK', latitude: 51.5074, longitude: -0.1278 })
    await app.enableAlarm()

    const result = london.success ? await app.selectLocation(london.location.id) : null

    expect(result?.snapshot.alarm?.locationLabel).toBe('London, UK')
    expect(app.scheduler.armedAlarmIds()).toHaveLength(1)
  })

  test('should re-arm with a new timing policy only while armed', async () => {
    const app = await startWithSeattle()

    expect(await app.setTimingPolicy('civilDawn')).toBeNull()

    await app.enableAlarm()
    const result = await app.setTimingPolicy('afterSunrise')

    expect(result?.snapshot.alarm?.targetInstant).toEqual(new Date('2024-06-21T07:22:00Z'))
  })

  test('should disarm the alarm', async () => {
    const app = await startWithSeattle()
    await app.enableAlarm()

    const result = await app.disableAlarm()

    expect(result.snapshot.state).toBe('idle')
    expect(app.scheduler.armedAlarmIds()).toEqual([])
  })

  test('should report a refused permission when arming', async () => {
    const app = createApp(async () => false)
    await app.start()
    await app.addLocation({ name: 'Seattle, WA', latitude: 47.6062, longitude: -122.3321 })

    const result = await app.enableAlarm()

    expect(result.success === false && result.error.message).toBe(
      'Failed to schedule alarm: Alarm scheduling is not authorized'
    )
  })

  test('should report missing location services', async () => {
    const result = await createApp().addCurrentLocation()

    expect(result).toEqual({
      success: false,
      error: { code: 'LOCATION_UNAVAILABLE', message: 'Location services are not available', recoverable: false }
    })
  })

  test('should add the current position when a provider is given', async () => {
    const app = new SunriseAlarmApp({
      config: CONFIG,
      settings,
      timeService,
      locationProvider: {
        getCurrentPosition: async () => ({ success: true, position: { latitude: 35.6762, longitude: 139.6503 } })
      }
    })
    apps.push(app)

    const result = await app.addCurrentLocation()

    expect(result.success && result.location.name).toBe('Current Location')
  })
})
