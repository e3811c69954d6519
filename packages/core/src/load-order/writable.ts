import { LoadOrderError } from '../errors'
import { Plugin } from '../plugin'
import { countActivePlugins, findPlugin, type ReadableLoadOrder } from './readable'
import {
  insertPlugin,
  isInstalled,
  resolvePlugins,
  validateNoDuplicates,
  type MutableLoadOrder,
} from './mutable'

/**
 * Full capability surface of a load-order persistence strategy.
 *
 * Mutations only change the in-memory order; `save()` projects it onto disk
 * and `load()` replaces it from disk. Callers must await each operation
 * before starting the next one on the same instance.
 */
export interface WritableLoadOrder extends ReadableLoadOrder {
  load(): Promise<void>
  save(): Promise<void>
  setLoadOrder(pluginNames: readonly string[]): Promise<void>
  setPluginIndex(pluginName: string, position: number): Promise<void>
  isSelfConsistent(): Promise<boolean>
  activate(pluginName: string): Promise<void>
  deactivate(pluginName: string): Promise<void>
  setActivePlugins(activePluginNames: readonly string[]): Promise<void>
}

function tooManyActivePlugins(limit: number, requested: number): LoadOrderError {
  return new LoadOrderError({
    code: 'TOO_MANY_ACTIVE_PLUGINS',
    message: `Cannot have ${requested} active plugins, the limit is ${limit}`,
  })
}

/**
 * Activate a plugin, adding it to the order first if it is installed but not
 * yet present.
 */
export async function activate(loadOrder: MutableLoadOrder, pluginName: string): Promise<void> {
  const existing = findPlugin(loadOrder.plugins, pluginName)
  if (existing?.isActive) return

  const limit = loadOrder.gameSettings.maxActivePlugins
  const activeCount = countActivePlugins(loadOrder.plugins)
  if (activeCount >= limit) {
    throw tooManyActivePlugins(limit, activeCount + 1)
  }

  if (existing) {
    existing.activate()
    return
  }

  const plugin = await Plugin.fromFile(pluginName, loadOrder.gameSettings)
  plugin.activate()
  insertPlugin(loadOrder, plugin)
}

export function deactivate(loadOrder: MutableLoadOrder, pluginName: string): Promise<void> {
  if (loadOrder.gameSettings.isImplicitlyActive(pluginName)) {
    return Promise.reject(
      new LoadOrderError({
        code: 'IMPLICITLY_ACTIVE_PLUGIN',
        message: `"${pluginName}" is always active and cannot be deactivated`,
        pluginName,
      })
    )
  }

  findPlugin(loadOrder.plugins, pluginName)?.deactivate()
  return Promise.resolve()
}

/**
 * Make exactly the named plugins active. Plugins not yet in the order are
 * added; every implicitly active plugin that is installed must be named.
 */
export async function setActivePlugins(
  loadOrder: MutableLoadOrder,
  activePluginNames: readonly string[]
): Promise<void> {
  const limit = loadOrder.gameSettings.maxActivePlugins
  if (activePluginNames.length > limit) {
    throw tooManyActivePlugins(limit, activePluginNames.length)
  }

  validateNoDuplicates(activePluginNames)
  const plugins = await resolvePlugins(loadOrder, activePluginNames)

  for (const implicit of loadOrder.gameSettings.implicitlyActivePlugins) {
    const named = plugins.some((plugin) => plugin.nameMatches(implicit))
    if (named) continue

    const installed =
      findPlugin(loadOrder.plugins, implicit) !== null ||
      (await isInstalled(loadOrder, implicit))
    if (installed) {
      throw new LoadOrderError({
        code: 'IMPLICITLY_ACTIVE_PLUGIN',
        message: `"${implicit}" is always active and must be included`,
        pluginName: implicit,
      })
    }
  }

  for (const plugin of loadOrder.plugins) {
    plugin.deactivate()
  }

  for (const plugin of plugins) {
    if (!loadOrder.plugins.includes(plugin)) {
      insertPlugin(loadOrder, plugin)
    }
    plugin.activate()
  }
}
