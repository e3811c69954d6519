import * as fs from 'node:fs/promises'
import * as path from 'node:path'
import * as iconv from 'iconv-lite'
import type { ActivePluginsFileFormat, GameSettings } from '../game-settings'
import { LoadOrderError, isNotFoundError, toLoadOrderError } from '../errors'

/** Code page the engine reads and writes the active plugins file in. */
export const ACTIVE_PLUGINS_ENCODING = 'windows-1252'

export const GAME_FILES_HEADER = '[Game Files]'

const GAME_FILE_LINE = /GameFile[0-9]{1,3}=(.+\.es(?:m|p))/i
const NEWLINE = Buffer.from('\n')

function assertEncoding(encoding: string): void {
  if (!iconv.encodingExists(encoding)) {
    throw new LoadOrderError({
      code: 'INVALID_ENCODING',
      message: `Unknown text encoding "${encoding}"`,
    })
  }
}

function encodeStrict(text: string, encoding: string, pluginName: string): Buffer {
  const bytes = iconv.encode(text, encoding)
  if (iconv.decode(bytes, encoding) !== text) {
    throw new LoadOrderError({
      code: 'ENCODE_ERROR',
      message: `"${pluginName}" cannot be represented in ${encoding}`,
      pluginName,
    })
  }
  return bytes
}

function lineToPluginName(line: string, format: ActivePluginsFileFormat): string {
  if (format === 'legacy-keyed') {
    return GAME_FILE_LINE.exec(line)?.[1] ?? ''
  }
  return line
}

/**
 * Plugin names listed in an active plugins file. Lines that name nothing are
 * skipped: blanks, `#` comments and, in the keyed format, anything that is
 * not a `GameFileN=` entry.
 */
export function decodeActivePluginNames(
  content: Buffer,
  format: ActivePluginsFileFormat,
  encoding: string = ACTIVE_PLUGINS_ENCODING
): string[] {
  assertEncoding(encoding)

  return iconv
    .decode(content, encoding)
    .split('\n')
    .map((line) => (line.endsWith('\r') ? line.slice(0, -1) : line))
    .map((line) => lineToPluginName(line, format))
    .filter((name) => name.length > 0 && !name.startsWith('#'))
}

/**
 * Render an active plugins file: the prelude bytes unchanged, then one line
 * per plugin. Keyed entries are numbered from zero in the order given.
 */
export function encodeActivePluginNames(
  pluginNames: readonly string[],
  format: ActivePluginsFileFormat,
  prelude: Buffer = Buffer.alloc(0),
  encoding: string = ACTIVE_PLUGINS_ENCODING
): Buffer {
  assertEncoding(encoding)

  const lines = pluginNames.map((name, index) => {
    const line = format === 'legacy-keyed' ? `GameFile${index}=${name}` : name
    return encodeStrict(`${line}\n`, encoding, name)
  })

  return Buffer.concat([prelude, ...lines])
}

/**
 * Split off everything up to and including the `[Game Files]` line.
 *
 * Each line keeps its bytes but is re-terminated with `\n`. Content without
 * a header keeps every line except `GameFileN=` entries, and gets a header
 * line appended.
 */
export function splitPrelude(content: Buffer): Buffer {
  const header = Buffer.from(GAME_FILES_HEADER)
  const lines: Buffer[] = []

  let start = 0
  while (start < content.length) {
    const newline = content.indexOf(NEWLINE, start)
    const end = newline === -1 ? content.length : newline
    const line = content.subarray(start, end)
    lines.push(line)

    if (line.subarray(0, header.length).equals(header)) {
      return Buffer.concat(lines.flatMap((kept) => [kept, NEWLINE]))
    }
    start = end + 1
  }

  // Entries outside a section would otherwise be read back on the next load.
  const kept = lines.filter((line) => !GAME_FILE_LINE.test(line.toString('latin1')))
  return Buffer.concat([...kept.flatMap((line) => [line, NEWLINE]), header, NEWLINE])
}

async function readIfExists(filePath: string): Promise<Buffer | null> {
  try {
    return await fs.readFile(filePath)
  } catch (err) {
    if (isNotFoundError(err)) return null
    throw toLoadOrderError(err, filePath)
  }
}

/**
 * Bytes of the existing file that a rewrite must carry over. Only the keyed
 * format has one, and only once the file exists.
 */
export async function readFilePrelude(
  filePath: string,
  format: ActivePluginsFileFormat
): Promise<Buffer> {
  if (format !== 'legacy-keyed') return Buffer.alloc(0)

  const content = await readIfExists(filePath)
  return content ? splitPrelude(content) : Buffer.alloc(0)
}

export async function readActivePluginNames(
  settings: GameSettings,
  encoding: string = ACTIVE_PLUGINS_ENCODING
): Promise<string[]> {
  const content = await readIfExists(settings.activePluginsFile)
  if (!content) return []
  return decodeActivePluginNames(content, settings.activePluginsFileFormat, encoding)
}

/**
 * Rewrite the active plugins file. The whole file is encoded before anything
 * is written, so an unencodable name leaves the existing file as it was.
 */
export async function writeActivePluginNames(
  settings: GameSettings,
  pluginNames: readonly string[],
  encoding: string = ACTIVE_PLUGINS_ENCODING
): Promise<void> {
  const filePath = settings.activePluginsFile
  const format = settings.activePluginsFileFormat

  const prelude = await readFilePrelude(filePath, format)
  const content = encodeActivePluginNames(pluginNames, format, prelude, encoding)

  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true })
    await fs.writeFile(filePath, content)
  } catch (err) {
    throw toLoadOrderError(err, filePath)
  }
}
