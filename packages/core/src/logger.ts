import { loadConfig, type LogLevel } from '@modorder/config'

const LEVEL_RANK: Readonly<Record<LogLevel, number>> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
}

function enabled(level: Exclude<LogLevel, 'silent'>): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[loadConfig().MODORDER_LOG_LEVEL]
}

function prefix(message: string): string {
  return `[${new Date().toISOString()}] [LoadOrder] ${message}`
}

export function loadOrderDebug(message: string, meta?: Record<string, unknown>): void {
  if (!enabled('debug')) return
  if (meta) {
    console.debug(prefix(message), meta)
    return
  }
  console.debug(prefix(message))
}

export function loadOrderLog(message: string, meta?: Record<string, unknown>): void {
  if (!enabled('info')) return
  if (meta) {
    console.log(prefix(message), meta)
    return
  }
  console.log(prefix(message))
}

export function loadOrderWarn(message: string, meta?: Record<string, unknown>): void {
  if (!enabled('warn')) return
  if (meta) {
    console.warn(prefix(message), meta)
    return
  }
  console.warn(prefix(message))
}

export function loadOrderError(
  message: string,
  error?: unknown,
  meta?: Record<string, unknown>
): void {
  if (!enabled('error')) return
  if (meta) {
    console.error(prefix(message), meta, error)
    return
  }
  if (error !== undefined) {
    console.error(prefix(message), error)
    return
  }
  console.error(prefix(message))
}
