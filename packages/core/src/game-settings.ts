import * as path from 'node:path'

export enum GameId {
  Morrowind = 'Morrowind',
  Oblivion = 'Oblivion',
  Fallout3 = 'Fallout3',
  FalloutNV = 'FalloutNV',
}

export type ActivePluginsFileFormat = 'plain' | 'legacy-keyed'

/** The engine refuses to load more active plugins than this. */
export const MAX_ACTIVE_PLUGINS = 255

const MASTER_FILES: Readonly<Record<GameId, string>> = {
  [GameId.Morrowind]: 'Morrowind.esm',
  [GameId.Oblivion]: 'Oblivion.esm',
  [GameId.Fallout3]: 'Fallout3.esm',
  [GameId.FalloutNV]: 'FalloutNV.esm',
}

/**
 * Per-game paths and identity.
 *
 * Morrowind keeps its plugins in `Data Files` and its active list inside
 * `Morrowind.ini`; the later games use `Data` and a `plugins.txt` in the
 * user's local application data directory.
 */
export class GameSettings {
  readonly id: GameId
  readonly gamePath: string
  readonly localPath: string

  constructor(id: GameId, gamePath: string, localPath?: string) {
    this.id = id
    this.gamePath = gamePath
    this.localPath = localPath ?? gamePath
  }

  get pluginsDirectory(): string {
    return path.join(this.gamePath, this.id === GameId.Morrowind ? 'Data Files' : 'Data')
  }

  get activePluginsFile(): string {
    if (this.id === GameId.Morrowind) {
      return path.join(this.gamePath, 'Morrowind.ini')
    }
    return path.join(this.localPath, 'plugins.txt')
  }

  get activePluginsFileFormat(): ActivePluginsFileFormat {
    return this.id === GameId.Morrowind ? 'legacy-keyed' : 'plain'
  }

  get masterFile(): string {
    return MASTER_FILES[this.id]
  }

  get implicitlyActivePlugins(): readonly string[] {
    return [this.masterFile]
  }

  get maxActivePlugins(): number {
    return MAX_ACTIVE_PLUGINS
  }

  isImplicitlyActive(pluginName: string): boolean {
    const lowered = pluginName.toLowerCase()
    return this.implicitlyActivePlugins.some((name) => name.toLowerCase() === lowered)
  }

  pluginPath(filename: string): string {
    return path.join(this.pluginsDirectory, filename)
  }
}
