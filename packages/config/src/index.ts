export {
  configSchema,
  loadConfig,
  _resetConfigForTest,
  GAME_IDS,
  LOG_LEVELS,
  type Config,
  type LogLevel,
} from './env'
