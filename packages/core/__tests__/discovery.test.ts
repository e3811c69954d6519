import * as fs from 'node:fs/promises'
import { afterEach, describe, expect, it } from 'vitest'
import { GameId } from '../src/game-settings'
import { Plugin } from '../src/plugin'
import {
  PLUGIN_READ_BATCH_SIZE,
  findPluginsInDir,
  loadPluginsFromDir,
  pluginSorter,
} from '../src/load-order/discovery'
import { createTestGame, writeInvalidPlugin, writePlugin, type TestGame } from './helpers'

let game: TestGame | undefined

afterEach(async () => {
  await game?.cleanup()
  game = undefined
})

async function setup(gameId: GameId = GameId.Oblivion) {
  game = await createTestGame(gameId)
  return game
}

describe('findPluginsInDir', () => {
  it('lists only files with plugin extensions', async () => {
    const { settings } = await setup()
    await writePlugin(settings, 'A.esp')
    await writePlugin(settings, 'B.ESM')
    await fs.writeFile(settings.pluginPath('readme.txt'), 'hello')
    await fs.mkdir(settings.pluginPath('Folder.esp'))

    const filenames = await findPluginsInDir(settings)

    expect(filenames.sort()).toEqual(['A.esp', 'B.ESM'])
  })

  it('prefers an unghosted file over its ghosted twin', async () => {
    const { settings } = await setup()
    await writePlugin(settings, 'A.esp')
    await writePlugin(settings, 'A.esp.ghost')
    await writePlugin(settings, 'B.esm.ghost')

    const filenames = await findPluginsInDir(settings)

    expect(filenames.sort()).toEqual(['A.esp', 'B.esm.ghost'])
  })

  it('returns nothing when the directory is missing', async () => {
    const { settings } = await setup()
    await fs.rm(settings.pluginsDirectory, { recursive: true })

    await expect(findPluginsInDir(settings)).resolves.toEqual([])
  })
})

describe('loadPluginsFromDir', () => {
  it('drops files that are not valid plugins', async () => {
    const { settings } = await setup()
    await writePlugin(settings, 'A.esp')
    await writeInvalidPlugin(settings, 'Broken.esp')
    await writePlugin(settings, 'C.esm.ghost')

    const plugins = await loadPluginsFromDir(settings)

    expect(plugins.map((plugin) => plugin.name).sort()).toEqual(['A.esp', 'C.esm'])
  })

  it('reads directories larger than one batch', async () => {
    const { settings } = await setup()
    const count = PLUGIN_READ_BATCH_SIZE + 6
    const filenames = Array.from(
      { length: count },
      (_, i) => `Plugin${String(i).padStart(3, '0')}.esp`
    )
    for (const filename of filenames) {
      await writePlugin(settings, filename)
    }
    await writeInvalidPlugin(settings, 'Broken.esp')

    const plugins = await loadPluginsFromDir(settings)

    expect(plugins.map((plugin) => plugin.name).sort()).toEqual(filenames)
  })
})

describe('pluginSorter', () => {
  async function pluginAt(filename: string, seconds: number, master = false): Promise<Plugin> {
    if (!game) throw new Error('No test game')
    const { settings } = game
    await writePlugin(settings, filename, { master })
    await fs.utimes(settings.pluginPath(filename), seconds, seconds)
    return Plugin.fromFile(filename, settings)
  }

  it('puts masters before non-masters whatever their times', async () => {
    await setup()
    const plugin = await pluginAt('Old.esp', 1)
    const master = await pluginAt('New.esm', 100, true)

    expect([plugin, master].sort(pluginSorter).map((p) => p.name)).toEqual(['New.esm', 'Old.esp'])
  })

  it('orders by modification time', async () => {
    await setup()
    const later = await pluginAt('A.esp', 20)
    const earlier = await pluginAt('B.esp', 10)

    expect([later, earlier].sort(pluginSorter).map((p) => p.name)).toEqual(['B.esp', 'A.esp'])
  })

  it('breaks time ties by case-insensitive name, then by exact name', async () => {
    await setup()
    const upper = await pluginAt('B.esp', 10)
    const lower = await pluginAt('a.esp', 10)
    const lowerTwin = await pluginAt('b.esp', 10)

    expect([lowerTwin, upper, lower].sort(pluginSorter).map((p) => p.name)).toEqual([
      'a.esp',
      'B.esp',
      'b.esp',
    ])
  })
})
