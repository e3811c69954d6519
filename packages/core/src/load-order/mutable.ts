import { LoadOrderError, isPluginValidationError } from '../errors'
import { Plugin, pluginNamesMatch } from '../plugin'
import { loadOrderDebug, loadOrderWarn } from '../logger'
import { countActivePlugins, findPlugin, indexOf, type ReadableLoadOrder } from './readable'

/**
 * A load order whose plugin list can be changed in place. Each strategy
 * decides where newly added plugins go through `insertPosition`.
 */
export interface MutableLoadOrder extends ReadableLoadOrder {
  plugins: Plugin[]
  /** Preferred index for a plugin not yet in the order, or null to append. */
  insertPosition(plugin: Plugin): number | null
}

export async function isInstalled(
  loadOrder: MutableLoadOrder,
  pluginName: string
): Promise<boolean> {
  try {
    await Plugin.fromFile(pluginName, loadOrder.gameSettings)
    return true
  } catch (err) {
    if (isPluginValidationError(err)) return false
    throw err
  }
}

export function insertPlugin(loadOrder: MutableLoadOrder, plugin: Plugin): number {
  const index = loadOrder.insertPosition(plugin) ?? loadOrder.plugins.length
  loadOrder.plugins.splice(index, 0, plugin)
  return index
}

export async function addToLoadOrder(
  loadOrder: MutableLoadOrder,
  pluginName: string
): Promise<number> {
  const plugin = await Plugin.fromFile(pluginName, loadOrder.gameSettings)
  return insertPlugin(loadOrder, plugin)
}

/**
 * Existing plugins are reused so they keep their active state; the rest are
 * read from disk.
 */
export async function resolvePlugins(
  loadOrder: MutableLoadOrder,
  pluginNames: readonly string[]
): Promise<Plugin[]> {
  return Promise.all(
    pluginNames.map(
      (name) =>
        findPlugin(loadOrder.plugins, name) ?? Plugin.fromFile(name, loadOrder.gameSettings)
    )
  )
}

export function validateNoDuplicates(pluginNames: readonly string[]): void {
  pluginNames.forEach((name, index) => {
    if (pluginNames.slice(0, index).some((other) => pluginNamesMatch(other, name))) {
      throw new LoadOrderError({
        code: 'DUPLICATE_PLUGIN',
        message: `"${name}" is listed more than once`,
        pluginName: name,
      })
    }
  })
}

export function validateMasterOrdering(plugins: readonly Plugin[]): void {
  const firstNonMaster = plugins.findIndex((plugin) => !plugin.isMasterFile)
  if (firstNonMaster === -1) return

  const misplaced = plugins.slice(firstNonMaster).find((plugin) => plugin.isMasterFile)
  if (misplaced) {
    throw new LoadOrderError({
      code: 'NON_MASTER_BEFORE_MASTER',
      message: `Master "${misplaced.name}" comes after non-master "${plugins[firstNonMaster]?.name}"`,
      pluginName: misplaced.name,
    })
  }
}

function validateIndex(plugins: readonly Plugin[], plugin: Plugin, position: number): void {
  if (plugin.isMasterFile) {
    const firstNonMaster = plugins.findIndex((p) => !p.isMasterFile)
    if (firstNonMaster !== -1 && position > firstNonMaster) {
      throw new LoadOrderError({
        code: 'NON_MASTER_BEFORE_MASTER',
        message: `Cannot place master "${plugin.name}" after non-master "${plugins[firstNonMaster]?.name}"`,
        pluginName: plugin.name,
      })
    }
    return
  }

  const lastMaster = plugins.map((p) => p.isMasterFile).lastIndexOf(true)
  if (lastMaster !== -1 && position <= lastMaster) {
    throw new LoadOrderError({
      code: 'NON_MASTER_BEFORE_MASTER',
      message: `Cannot place non-master "${plugin.name}" before master "${plugins[lastMaster]?.name}"`,
      pluginName: plugin.name,
    })
  }
}

/**
 * Replace the whole order with the named plugins, in the given order.
 */
export async function replacePlugins(
  loadOrder: MutableLoadOrder,
  pluginNames: readonly string[]
): Promise<void> {
  validateNoDuplicates(pluginNames)
  const plugins = await resolvePlugins(loadOrder, pluginNames)
  validateMasterOrdering(plugins)
  loadOrder.plugins = plugins
}

/**
 * Move an existing plugin to `position`, or read a new one from disk and
 * insert it there. Positions past the end append.
 */
export async function moveOrInsertPluginWithIndex(
  loadOrder: MutableLoadOrder,
  pluginName: string,
  position: number
): Promise<void> {
  const existing = findPlugin(loadOrder.plugins, pluginName)
  const plugin = existing ?? (await Plugin.fromFile(pluginName, loadOrder.gameSettings))

  const remaining = loadOrder.plugins.filter((p) => p !== plugin)
  const index = Math.min(Math.max(0, position), remaining.length)
  validateIndex(remaining, plugin, index)

  remaining.splice(index, 0, plugin)
  loadOrder.plugins = remaining
}

/**
 * Mark the named plugins active. Names with no plugin in the order are
 * ignored, as are repeats.
 */
export function loadActivePlugins(loadOrder: MutableLoadOrder, pluginNames: Iterable<string>): void {
  for (const plugin of loadOrder.plugins) {
    plugin.deactivate()
  }

  for (const name of pluginNames) {
    const plugin = findPlugin(loadOrder.plugins, name)
    if (plugin) {
      plugin.activate()
    } else {
      loadOrderDebug('Ignoring active plugin that is not installed', { plugin: name })
    }
  }
}

/**
 * Activate the plugins the engine always loads, adding them to the order if
 * they are installed but missing from it.
 */
export async function addImplicitlyActivePlugins(loadOrder: MutableLoadOrder): Promise<void> {
  for (const name of loadOrder.gameSettings.implicitlyActivePlugins) {
    let index = indexOf(loadOrder.plugins, name)
    if (index === null) {
      try {
        index = await addToLoadOrder(loadOrder, name)
      } catch (err) {
        if (isPluginValidationError(err)) continue
        throw err
      }
    }
    loadOrder.plugins[index]?.activate()
  }
}

/**
 * Deactivate active plugins beyond the per-game ceiling, keeping the earliest
 * in load order. Returns the names deactivated.
 */
export function deactivateExcessPlugins(loadOrder: MutableLoadOrder): string[] {
  const limit = loadOrder.gameSettings.maxActivePlugins
  if (countActivePlugins(loadOrder.plugins) <= limit) return []

  const deactivated: string[] = []
  let kept = 0
  for (const plugin of loadOrder.plugins) {
    if (!plugin.isActive) continue
    if (kept < limit) {
      kept += 1
    } else {
      plugin.deactivate()
      deactivated.push(plugin.name)
    }
  }

  loadOrderWarn('Deactivated plugins beyond the active plugin limit', {
    limit,
    deactivated: deactivated.length,
  })
  return deactivated
}
