// Game settings
export { GameId, GameSettings, MAX_ACTIVE_PLUGINS, type ActivePluginsFileFormat } from './game-settings'

// Plugins
export { Plugin, pluginNamesMatch, trimGhostExtension, hasPluginExtension } from './plugin'

// Errors
export {
  LoadOrderError,
  isLoadOrderError,
  isPluginValidationError,
  toLoadOrderError,
  type LoadOrderErrorCode,
} from './errors'

// Logging
export { loadOrderDebug, loadOrderLog, loadOrderWarn, loadOrderError } from './logger'

// Load order capability surface
export type { ReadableLoadOrder } from './load-order/readable'
export type { MutableLoadOrder } from './load-order/mutable'
export type { WritableLoadOrder } from './load-order/writable'
export {
  pluginNames,
  indexOf,
  pluginAt,
  activePluginNames,
  isActive,
  countActivePlugins,
  findFirstNonMasterPosition,
} from './load-order/readable'
export {
  addToLoadOrder,
  loadActivePlugins,
  addImplicitlyActivePlugins,
  deactivateExcessPlugins,
  replacePlugins,
  moveOrInsertPluginWithIndex,
  validateNoDuplicates,
  validateMasterOrdering,
} from './load-order/mutable'
export { activate, deactivate, setActivePlugins } from './load-order/writable'

// Timestamp-based strategy
export { TimestampBasedLoadOrder } from './load-order/timestamp-based'
export {
  PLUGIN_READ_BATCH_SIZE,
  findPluginsInDir,
  loadPluginsFromDir,
  pluginSorter,
} from './load-order/discovery'
export { paddedUniqueTimestamps, applyTimestamps } from './load-order/timestamps'
export {
  ACTIVE_PLUGINS_ENCODING,
  GAME_FILES_HEADER,
  decodeActivePluginNames,
  encodeActivePluginNames,
  splitPrelude,
  readFilePrelude,
  readActivePluginNames,
  writeActivePluginNames,
} from './load-order/active-plugins'

// Construction
export { createLoadOrder, createLoadOrderFromEnv, gameSettingsFromEnv } from './factory'
