import type { GameSettings } from '../game-settings'
import type { Plugin } from '../plugin'

/**
 * Read-only view of a load order, shared by every persistence strategy.
 */
export interface ReadableLoadOrder {
  readonly gameSettings: GameSettings
  pluginNames(): string[]
  indexOf(pluginName: string): number | null
  pluginAt(index: number): string | null
  activePluginNames(): string[]
  isActive(pluginName: string): boolean
}

export function pluginNames(plugins: readonly Plugin[]): string[] {
  return plugins.map((plugin) => plugin.name)
}

export function indexOf(plugins: readonly Plugin[], pluginName: string): number | null {
  const index = plugins.findIndex((plugin) => plugin.nameMatches(pluginName))
  return index === -1 ? null : index
}

export function findPlugin(plugins: readonly Plugin[], pluginName: string): Plugin | null {
  return plugins.find((plugin) => plugin.nameMatches(pluginName)) ?? null
}

export function pluginAt(plugins: readonly Plugin[], index: number): string | null {
  return plugins[index]?.name ?? null
}

export function activePluginNames(plugins: readonly Plugin[]): string[] {
  return plugins.filter((plugin) => plugin.isActive).map((plugin) => plugin.name)
}

export function isActive(plugins: readonly Plugin[], pluginName: string): boolean {
  return findPlugin(plugins, pluginName)?.isActive ?? false
}

export function countActivePlugins(plugins: readonly Plugin[]): number {
  return plugins.reduce((count, plugin) => (plugin.isActive ? count + 1 : count), 0)
}

export function findFirstNonMasterPosition(plugins: readonly Plugin[]): number | null {
  const index = plugins.findIndex((plugin) => !plugin.isMasterFile)
  return index === -1 ? null : index
}
