import type { Dirent } from 'node:fs'
import * as fs from 'node:fs/promises'
import type { GameSettings } from '../game-settings'
import { isNotFoundError, isPluginValidationError, toLoadOrderError } from '../errors'
import { loadOrderDebug } from '../logger'
import { Plugin, hasPluginExtension, trimGhostExtension } from '../plugin'

/**
 * List candidate plugin filenames in the game's plugins directory. A missing
 * directory is an empty game, not an error.
 */
export async function findPluginsInDir(settings: GameSettings): Promise<string[]> {
  const dir = settings.pluginsDirectory
  let entries: Dirent[]
  try {
    entries = await fs.readdir(dir, { withFileTypes: true })
  } catch (err) {
    if (isNotFoundError(err)) return []
    throw toLoadOrderError(err, dir)
  }

  // An unghosted file wins over its ghosted twin.
  const seen = new Set<string>()
  const filenames = entries
    .filter((entry) => entry.isFile() && hasPluginExtension(entry.name))
    .map((entry) => entry.name)
    .sort((a, b) => Number(a !== trimGhostExtension(a)) - Number(b !== trimGhostExtension(b)))

  return filenames.filter((filename) => {
    const key = trimGhostExtension(filename).toLowerCase()
    if (seen.has(key)) return false
    seen.add(key)
    return true
  })
}

/** Candidates read at once, keeping open file handles bounded. */
export const PLUGIN_READ_BATCH_SIZE = 64

/**
 * Read candidates concurrently, a batch at a time. Candidates that fail
 * validation are dropped; the rest keep their directory order. Other I/O
 * failures propagate.
 */
export async function loadPluginsFromDir(settings: GameSettings): Promise<Plugin[]> {
  const filenames = await findPluginsInDir(settings)
  const plugins: Plugin[] = []

  for (let start = 0; start < filenames.length; start += PLUGIN_READ_BATCH_SIZE) {
    const batch = filenames.slice(start, start + PLUGIN_READ_BATCH_SIZE)
    const results = await Promise.allSettled(
      batch.map((filename) => Plugin.fromFile(filename, settings))
    )

    results.forEach((result, index) => {
      if (result.status === 'fulfilled') {
        plugins.push(result.value)
        return
      }
      if (!isPluginValidationError(result.reason)) throw result.reason
      loadOrderDebug('Skipping file that is not a valid plugin', {
        file: batch[index],
        reason: result.reason.message,
      })
    })
  }

  return plugins
}

function compareNames(a: string, b: string): number {
  const lowerA = a.toLowerCase()
  const lowerB = b.toLowerCase()
  if (lowerA !== lowerB) return lowerA < lowerB ? -1 : 1
  if (a === b) return 0
  return a < b ? -1 : 1
}

/**
 * Canonical order for timestamp-persisted load orders: masters first, then
 * oldest first, then by name.
 */
export function pluginSorter(a: Plugin, b: Plugin): number {
  if (a.isMasterFile !== b.isMasterFile) {
    return a.isMasterFile ? -1 : 1
  }

  const byTime = a.modificationTime.getTime() - b.modificationTime.getTime()
  if (byTime !== 0) return byTime

  return compareNames(a.name, b.name)
}
