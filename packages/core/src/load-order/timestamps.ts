import type { Plugin } from '../plugin'

const PADDING_MS = 60_000

/**
 * One distinct timestamp per plugin, ascending: the distinct times already in
 * use, then as many as are missing, each a minute after the previous.
 */
export function paddedUniqueTimestamps(plugins: readonly Plugin[]): Date[] {
  const times = [...new Set(plugins.map((plugin) => plugin.modificationTime.getTime()))].sort(
    (a, b) => a - b
  )

  while (times.length < plugins.length) {
    const last = times[times.length - 1] ?? 0
    times.push(last + PADDING_MS)
  }

  return times.map((time) => new Date(time))
}

/**
 * Write `timestamps[i]` to `plugins[i]`, all at once. The first failure
 * rejects; writes that already landed are not undone.
 */
export async function applyTimestamps(
  plugins: readonly Plugin[],
  timestamps: readonly Date[]
): Promise<void> {
  await Promise.all(
    plugins.map((plugin, index) => {
      const timestamp = timestamps[index]
      return timestamp ? plugin.setModificationTime(timestamp) : Promise.resolve()
    })
  )
}
