export type LoadOrderErrorCode =
  | 'INVALID_PLUGIN'
  | 'DUPLICATE_PLUGIN'
  | 'NON_MASTER_BEFORE_MASTER'
  | 'PLUGIN_NOT_FOUND'
  | 'TOO_MANY_ACTIVE_PLUGINS'
  | 'IMPLICITLY_ACTIVE_PLUGIN'
  | 'IO_ERROR'
  | 'ENCODE_ERROR'
  | 'INVALID_ENCODING'

export class LoadOrderError extends Error {
  readonly code: LoadOrderErrorCode
  readonly pluginName?: string
  readonly path?: string

  constructor(params: {
    code: LoadOrderErrorCode
    message: string
    pluginName?: string
    path?: string
    cause?: unknown
  }) {
    super(params.message, params.cause === undefined ? undefined : { cause: params.cause })
    this.name = 'LoadOrderError'
    this.code = params.code
    this.pluginName = params.pluginName
    this.path = params.path
  }
}

export function isLoadOrderError(error: unknown): error is LoadOrderError {
  return error instanceof LoadOrderError
}

/** A file that is missing or is not a plugin, as opposed to a failed read. */
export function isPluginValidationError(error: unknown): error is LoadOrderError {
  return (
    isLoadOrderError(error) &&
    (error.code === 'INVALID_PLUGIN' || error.code === 'PLUGIN_NOT_FOUND')
  )
}

/**
 * Filesystem error codes that mean "not there" rather than "could not access".
 */
export function isNotFoundError(error: unknown): boolean {
  if (!error || typeof error !== 'object' || !('code' in error)) return false
  return error.code === 'ENOENT' || error.code === 'ENOTDIR'
}

export function toLoadOrderError(error: unknown, path: string): LoadOrderError {
  if (isLoadOrderError(error)) return error
  const reason = error instanceof Error ? error.message : String(error)
  return new LoadOrderError({
    code: 'IO_ERROR',
    message: `I/O error at "${path}": ${reason}`,
    path,
    cause: error,
  })
}
