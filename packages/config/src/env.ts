import { z } from 'zod'

export const GAME_IDS = ['Morrowind', 'Oblivion', 'Fallout3', 'FalloutNV'] as const

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const

export const configSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  // Game whose load order is managed
  MODORDER_GAME: z.enum(GAME_IDS).optional(),
  MODORDER_GAME_PATH: z.string().min(1).optional(),
  // Holds plugins.txt for every game except Morrowind
  MODORDER_LOCAL_PATH: z.string().min(1).optional(),
  MODORDER_LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
})

export type Config = z.infer<typeof configSchema>
export type LogLevel = Config['MODORDER_LOG_LEVEL']

let cachedConfig: Config | null = null

export function loadConfig(): Config {
  if (cachedConfig) {
    return cachedConfig
  }

  const result = configSchema.safeParse(process.env)

  if (!result.success) {
    console.error('Invalid environment configuration:')
    console.error(result.error.format())
    throw new Error('Invalid environment configuration')
  }

  cachedConfig = result.data
  return cachedConfig
}

export function _resetConfigForTest(): void {
  cachedConfig = null
}
