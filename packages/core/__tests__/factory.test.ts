import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { _resetConfigForTest } from '@modorder/config'
import { GameId, GameSettings } from '../src/game-settings'
import { TimestampBasedLoadOrder } from '../src/load-order/timestamp-based'
import { createLoadOrder, createLoadOrderFromEnv, gameSettingsFromEnv } from '../src/factory'

describe('createLoadOrder', () => {
  it.each([GameId.Morrowind, GameId.Oblivion, GameId.Fallout3, GameId.FalloutNV])(
    'uses plugin timestamps for %s',
    (id) => {
      const settings = new GameSettings(id, '/games/test')

      const loadOrder = createLoadOrder(settings)

      expect(loadOrder).toBeInstanceOf(TimestampBasedLoadOrder)
      expect(loadOrder.gameSettings).toBe(settings)
      expect(loadOrder.pluginNames()).toEqual([])
    }
  )
})

describe('gameSettingsFromEnv', () => {
  beforeEach(() => {
    _resetConfigForTest()
  })

  afterEach(() => {
    vi.unstubAllEnvs()
    _resetConfigForTest()
  })

  it('builds settings from the environment', () => {
    vi.stubEnv('MODORDER_GAME', 'FalloutNV')
    vi.stubEnv('MODORDER_GAME_PATH', '/games/nv')
    vi.stubEnv('MODORDER_LOCAL_PATH', '/local/nv')

    const settings = gameSettingsFromEnv()

    expect(settings.id).toBe(GameId.FalloutNV)
    expect(settings.gamePath).toBe('/games/nv')
    expect(settings.localPath).toBe('/local/nv')
  })

  it('defaults the local path to the game path', () => {
    vi.stubEnv('MODORDER_GAME', 'Morrowind')
    vi.stubEnv('MODORDER_GAME_PATH', '/games/mw')
    vi.stubEnv('MODORDER_LOCAL_PATH', undefined)

    expect(gameSettingsFromEnv().localPath).toBe('/games/mw')
  })

  it('requires a game and a game path', () => {
    vi.stubEnv('MODORDER_GAME', 'Oblivion')
    vi.stubEnv('MODORDER_GAME_PATH', undefined)

    expect(() => gameSettingsFromEnv()).toThrow('MODORDER_GAME and MODORDER_GAME_PATH must be set')
  })

  it('creates a load order for the configured game', () => {
    vi.stubEnv('MODORDER_GAME', 'Oblivion')
    vi.stubEnv('MODORDER_GAME_PATH', '/games/ob')

    const loadOrder = createLoadOrderFromEnv()

    expect(loadOrder.gameSettings.id).toBe(GameId.Oblivion)
    expect(loadOrder.gameSettings.pluginsDirectory).toBe('/games/ob/Data')
  })
})
