import { loadConfig } from '@modorder/config'
import { GameId, GameSettings } from './game-settings'
import { TimestampBasedLoadOrder } from './load-order/timestamp-based'
import type { WritableLoadOrder } from './load-order/writable'

/**
 * Every supported game keeps its order in plugin timestamps.
 */
export function createLoadOrder(settings: GameSettings): WritableLoadOrder {
  return new TimestampBasedLoadOrder(settings)
}

export function gameSettingsFromEnv(): GameSettings {
  const config = loadConfig()
  if (!config.MODORDER_GAME || !config.MODORDER_GAME_PATH) {
    throw new Error('MODORDER_GAME and MODORDER_GAME_PATH must be set')
  }
  return new GameSettings(
    GameId[config.MODORDER_GAME],
    config.MODORDER_GAME_PATH,
    config.MODORDER_LOCAL_PATH
  )
}

export function createLoadOrderFromEnv(): WritableLoadOrder {
  return createLoadOrder(gameSettingsFromEnv())
}
