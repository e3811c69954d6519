import * as fs from 'node:fs/promises'
import * as os from 'node:os'
import * as path from 'node:path'
import * as iconv from 'iconv-lite'
import { GameId, GameSettings } from '../src/game-settings'
import { Plugin } from '../src/plugin'
import { TimestampBasedLoadOrder } from '../src/load-order/timestamp-based'

export interface TestGame {
  root: string
  settings: GameSettings
  cleanup: () => Promise<void>
}

export async function createTestGame(gameId: GameId): Promise<TestGame> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), 'modorder-'))
  const gamePath = path.join(root, 'game')
  const localPath = path.join(root, 'local')
  const settings = new GameSettings(gameId, gamePath, localPath)

  await fs.mkdir(settings.pluginsDirectory, { recursive: true })
  await fs.mkdir(localPath, { recursive: true })

  return {
    root,
    settings,
    cleanup: () => fs.rm(root, { recursive: true, force: true }),
  }
}

/**
 * Smallest file the plugin reader accepts: a header record with the master
 * flag set as asked. Morrowind ignores the flag and goes by extension.
 */
export function pluginHeader(gameId: GameId, master: boolean): Buffer {
  const header = Buffer.alloc(24)
  header.write(gameId === GameId.Morrowind ? 'TES3' : 'TES4', 0, 'latin1')
  header.writeUInt32LE(master ? 0x1 : 0, 8)
  return header
}

export async function writePlugin(
  settings: GameSettings,
  filename: string,
  options: { master?: boolean } = {}
): Promise<string> {
  const filePath = settings.pluginPath(filename)
  const master = options.master ?? filename.toLowerCase().replace(/\.ghost$/, '').endsWith('.esm')
  await fs.writeFile(filePath, pluginHeader(settings.id, master))
  return filePath
}

export async function writeInvalidPlugin(settings: GameSettings, filename: string): Promise<void> {
  await fs.writeFile(settings.pluginPath(filename), '\n')
}

/** Give the i-th file a modification time of i seconds after the epoch. */
export async function setTimestamps(
  settings: GameSettings,
  filenames: readonly string[]
): Promise<void> {
  for (const [index, filename] of filenames.entries()) {
    await fs.utimes(settings.pluginPath(filename), index, index)
  }
}

export async function modificationSeconds(settings: GameSettings, filename: string): Promise<number> {
  const stats = await fs.stat(settings.pluginPath(filename))
  return Math.round(stats.mtimeMs / 1000)
}

/**
 * Write the game's active plugins file in its own format, windows-1252
 * encoded. Morrowind gets a short ini prelude before its entries.
 */
export async function writeActivePluginsFile(
  settings: GameSettings,
  pluginNames: readonly string[]
): Promise<void> {
  const text =
    settings.id === GameId.Morrowind
      ? 'isrealmorrowindini=false\n[Game Files]\n' +
        pluginNames.map((name, index) => `GameFile${index}=${name}\n`).join('')
      : pluginNames.map((name) => `${name}\n`).join('')

  await fs.mkdir(path.dirname(settings.activePluginsFile), { recursive: true })
  await fs.writeFile(settings.activePluginsFile, iconv.encode(text, 'windows-1252'))
}

export const BLANK_PLUGINS = [
  'Blank.esm',
  'Blank.esp',
  'Blank - Different.esp',
  'Blank - Master Dependent.esp',
  'Blàñk.esp',
] as const

/**
 * A game with the master file and the blank plugins installed, timestamped
 * 0 to 5 seconds in that order, and an
 * in-memory order holding the master file and Blank.esp (both active) and
 * Blank - Different.esp (inactive).
 */
export async function prepareLoadOrder(
  gameId: GameId
): Promise<TestGame & { loadOrder: TimestampBasedLoadOrder }> {
  const game = await createTestGame(gameId)
  const { settings } = game

  await writePlugin(settings, settings.masterFile, { master: true })
  for (const filename of BLANK_PLUGINS) {
    await writePlugin(settings, filename)
  }
  await setTimestamps(settings, [settings.masterFile, ...BLANK_PLUGINS])

  const master = await Plugin.fromFile(settings.masterFile, settings)
  const blank = await Plugin.fromFile('Blank.esp', settings)
  const different = await Plugin.fromFile('Blank - Different.esp', settings)
  master.activate()
  blank.activate()

  const loadOrder = new TimestampBasedLoadOrder(settings)
  loadOrder.plugins = [master, blank, different]

  return { ...game, loadOrder }
}
