import { z } from 'zod'
import type { LogLevel } from '@/logger'

export interface AppConfig {
  apiUrl: string
  fetchTimeoutMs: number
  settingsFile: string
  testAlarmDelaySeconds: number
  logLevel: LogLevel
}

const envSchema = z.object({
  SUNRISE_API_URL: z.string().url().default('https://api.sunrise-sunset.org/json'),
  SUNRISE_FETCH_TIMEOUT_MS: z.coerce.number().int().min(1000).max(60000).default(10000),
  SUNRISE_SETTINGS_FILE: z.string().min(1).default('.sunrise-alarm/settings.json'),
  SUNRISE_TEST_ALARM_DELAY_SECONDS: z.coerce.number().int().min(1).max(3600).default(10),
  SUNRISE_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info')
})

/**
 * Read configuration from environment variables, applying defaults.
 * Throws with every invalid variable listed.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env)

  if (!parsed.success) {
    const problems = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ')
    throw new Error(`Invalid configuration - ${problems}`)
  }

  return {
    apiUrl: parsed.data.SUNRISE_API_URL,
    fetchTimeoutMs: parsed.data.SUNRISE_FETCH_TIMEOUT_MS,
    settingsFile: parsed.data.SUNRISE_SETTINGS_FILE,
    testAlarmDelaySeconds: parsed.data.SUNRISE_TEST_ALARM_DELAY_SECONDS,
    logLevel: parsed.data.SUNRISE_LOG_LEVEL
  }
}
