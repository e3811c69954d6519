import type { Stats } from 'node:fs'
import * as fs from 'node:fs/promises'
import * as path from 'node:path'
import { GameId, type GameSettings } from './game-settings'
import { LoadOrderError, isNotFoundError, toLoadOrderError } from './errors'

const GHOST_EXTENSION = '.ghost'
const PLUGIN_EXTENSIONS = new Set(['.esp', '.esm'])

// Flags live in the first record header; its length differs per game.
const HEADER_LENGTHS: Readonly<Record<GameId, number>> = {
  [GameId.Morrowind]: 16,
  [GameId.Oblivion]: 20,
  [GameId.Fallout3]: 24,
  [GameId.FalloutNV]: 24,
}
const FLAGS_OFFSET = 8
const MASTER_FLAG = 0x1

export function pluginNamesMatch(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase()
}

export function trimGhostExtension(filename: string): string {
  if (filename.toLowerCase().endsWith(GHOST_EXTENSION)) {
    return filename.slice(0, -GHOST_EXTENSION.length)
  }
  return filename
}

export function hasPluginExtension(filename: string): boolean {
  return PLUGIN_EXTENSIONS.has(path.extname(trimGhostExtension(filename)).toLowerCase())
}

function headerRecordType(gameId: GameId): string {
  return gameId === GameId.Morrowind ? 'TES3' : 'TES4'
}

async function resolvePluginPath(
  filename: string,
  settings: GameSettings
): Promise<{ filePath: string; stats: Stats }> {
  const candidates = filename.toLowerCase().endsWith(GHOST_EXTENSION)
    ? [filename]
    : [filename, filename + GHOST_EXTENSION]

  for (const candidate of candidates) {
    const filePath = settings.pluginPath(candidate)
    try {
      const stats = await fs.stat(filePath)
      if (stats.isFile()) {
        return { filePath, stats }
      }
    } catch (err) {
      if (!isNotFoundError(err)) throw toLoadOrderError(err, filePath)
    }
  }

  throw new LoadOrderError({
    code: 'PLUGIN_NOT_FOUND',
    message: `Plugin "${filename}" is not installed`,
    pluginName: trimGhostExtension(filename),
  })
}

async function readHeader(filePath: string, length: number): Promise<Buffer> {
  let handle: fs.FileHandle | undefined
  try {
    handle = await fs.open(filePath, 'r')
    const buffer = Buffer.alloc(length)
    const { bytesRead } = await handle.read(buffer, 0, length, 0)
    return buffer.subarray(0, bytesRead)
  } catch (err) {
    throw toLoadOrderError(err, filePath)
  } finally {
    await handle?.close()
  }
}

/**
 * One installed plugin file.
 *
 * Identity is the unghosted filename; everything else is read from disk at
 * construction, apart from the active flag, which starts out false.
 */
export class Plugin {
  readonly name: string
  readonly isMasterFile: boolean
  private readonly filePath: string
  private mtime: Date
  private activeFlag = false

  private constructor(name: string, filePath: string, isMasterFile: boolean, mtime: Date) {
    this.name = name
    this.filePath = filePath
    this.isMasterFile = isMasterFile
    this.mtime = mtime
  }

  /**
   * Construct a plugin from a filename in the game's plugins directory.
   * `<filename>.ghost` is used when the unghosted file does not exist.
   */
  static async fromFile(filename: string, settings: GameSettings): Promise<Plugin> {
    const name = trimGhostExtension(filename)
    if (!hasPluginExtension(name)) {
      throw new LoadOrderError({
        code: 'INVALID_PLUGIN',
        message: `"${filename}" does not have a plugin file extension`,
        pluginName: name,
      })
    }

    const { filePath, stats } = await resolvePluginPath(filename, settings)

    const headerLength = HEADER_LENGTHS[settings.id]
    const header = await readHeader(filePath, headerLength)
    if (
      header.length < headerLength ||
      header.toString('latin1', 0, 4) !== headerRecordType(settings.id)
    ) {
      throw new LoadOrderError({
        code: 'INVALID_PLUGIN',
        message: `"${filename}" is not a valid ${settings.id} plugin`,
        pluginName: name,
        path: filePath,
      })
    }

    const isMasterFile =
      settings.id === GameId.Morrowind
        ? path.extname(name).toLowerCase() === '.esm'
        : (header.readUInt32LE(FLAGS_OFFSET) & MASTER_FLAG) !== 0

    return new Plugin(name, filePath, isMasterFile, new Date(Math.round(stats.mtimeMs)))
  }

  get modificationTime(): Date {
    return new Date(this.mtime.getTime())
  }

  get isActive(): boolean {
    return this.activeFlag
  }

  get isGhosted(): boolean {
    return this.filePath.toLowerCase().endsWith(GHOST_EXTENSION)
  }

  nameMatches(name: string): boolean {
    return pluginNamesMatch(this.name, trimGhostExtension(name))
  }

  activate(): void {
    this.activeFlag = true
  }

  deactivate(): void {
    this.activeFlag = false
  }

  /**
   * Write the file's access and modification times. The in-memory time only
   * changes once the write has succeeded.
   */
  async setModificationTime(time: Date): Promise<void> {
    try {
      await fs.utimes(this.filePath, time, time)
    } catch (err) {
      throw toLoadOrderError(err, this.filePath)
    }
    this.mtime = new Date(time.getTime())
  }
}
