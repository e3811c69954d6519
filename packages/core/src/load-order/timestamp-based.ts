import type { GameSettings } from '../game-settings'
import type { Plugin } from '../plugin'
import { loadOrderError, loadOrderLog } from '../logger'
import {
  activePluginNames,
  findFirstNonMasterPosition,
  indexOf,
  isActive,
  pluginAt,
  pluginNames,
} from './readable'
import {
  addImplicitlyActivePlugins,
  deactivateExcessPlugins,
  loadActivePlugins,
  moveOrInsertPluginWithIndex,
  replacePlugins,
  type MutableLoadOrder,
} from './mutable'
import { activate, deactivate, setActivePlugins, type WritableLoadOrder } from './writable'
import { loadPluginsFromDir, pluginSorter } from './discovery'
import {
  ACTIVE_PLUGINS_ENCODING,
  readActivePluginNames,
  writeActivePluginNames,
} from './active-plugins'
import { applyTimestamps, paddedUniqueTimestamps } from './timestamps'

/**
 * Load order persisted through the plugin files' own modification times,
 * with activity kept in a per-game active plugins file.
 */
export class TimestampBasedLoadOrder implements WritableLoadOrder, MutableLoadOrder {
  readonly gameSettings: GameSettings
  plugins: Plugin[] = []
  private readonly encoding: string

  constructor(gameSettings: GameSettings, encoding: string = ACTIVE_PLUGINS_ENCODING) {
    this.gameSettings = gameSettings
    this.encoding = encoding
  }

  pluginNames(): string[] {
    return pluginNames(this.plugins)
  }

  indexOf(pluginName: string): number | null {
    return indexOf(this.plugins, pluginName)
  }

  pluginAt(index: number): string | null {
    return pluginAt(this.plugins, index)
  }

  activePluginNames(): string[] {
    return activePluginNames(this.plugins)
  }

  isActive(pluginName: string): boolean {
    return isActive(this.plugins, pluginName)
  }

  /** New masters go just before the first non-master; everything else appends. */
  insertPosition(plugin: Plugin): number | null {
    if (plugin.isMasterFile) {
      return findFirstNonMasterPosition(this.plugins)
    }
    return null
  }

  async load(): Promise<void> {
    this.plugins = []

    const plugins = await loadPluginsFromDir(this.gameSettings)
    this.plugins = plugins.sort(pluginSorter)

    const activeNames = await readActivePluginNames(this.gameSettings, this.encoding)
    loadActivePlugins(this, activeNames)

    await addImplicitlyActivePlugins(this)
    deactivateExcessPlugins(this)

    loadOrderLog('Loaded load order', {
      game: this.gameSettings.id,
      plugins: this.plugins.length,
      active: this.activePluginNames().length,
    })
  }

  /**
   * Write timestamps, then the active plugins file. Not atomic: if a write
   * fails, timestamps written before it stay written.
   */
  async save(): Promise<void> {
    const timestamps = paddedUniqueTimestamps(this.plugins)

    try {
      await applyTimestamps(this.plugins, timestamps)
      await writeActivePluginNames(this.gameSettings, this.activePluginNames(), this.encoding)
    } catch (err) {
      loadOrderError('Save failed, plugin timestamps may be partially updated', err, {
        game: this.gameSettings.id,
      })
      throw err
    }

    loadOrderLog('Saved load order', {
      game: this.gameSettings.id,
      plugins: this.plugins.length,
    })
  }

  setLoadOrder(names: readonly string[]): Promise<void> {
    return replacePlugins(this, names)
  }

  setPluginIndex(pluginName: string, position: number): Promise<void> {
    return moveOrInsertPluginWithIndex(this, pluginName, position)
  }

  /** There is no second record of the order that could disagree with the timestamps. */
  isSelfConsistent(): Promise<boolean> {
    return Promise.resolve(true)
  }

  activate(pluginName: string): Promise<void> {
    return activate(this, pluginName)
  }

  deactivate(pluginName: string): Promise<void> {
    return deactivate(this, pluginName)
  }

  setActivePlugins(names: readonly string[]): Promise<void> {
    return setActivePlugins(this, names)
  }
}
