/**
 * Module-scoped console logger.
 *
 * Each module creates its own logger with `createLogger('ModuleName')`. Output is
 * colourised per level and prefixed with an ISO timestamp and the module name.
 * The minimum level comes from `LOG_LEVEL`, falling back to an environment preset.
 */
import chalk from 'chalk'

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
}

interface LoggerConfig {
  enabled: boolean
  minLevel: LogLevel
  colorize: boolean
}

const ENV_PRESETS: Record<'development' | 'production' | 'test', LoggerConfig> = {
  development: { enabled: true, minLevel: LogLevel.DEBUG, colorize: true },
  production: { enabled: true, minLevel: LogLevel.INFO, colorize: false },
  test: { enabled: false, minLevel: LogLevel.ERROR, colorize: false },
}

type LogSink = (level: LogLevel, line: string) => void

const defaultSink: LogSink = (level, line) => {
  if (level === LogLevel.ERROR) {
    console.error(line)
  } else if (level === LogLevel.WARN) {
    console.warn(line)
  } else {
    console.log(line)
  }
}

let activeSink: LogSink = defaultSink

/**
 * Replaces the output sink for every logger. Returns a function restoring the
 * previous sink.
 */
export function setLogSink(sink: LogSink): () => void {
  const previous = activeSink
  activeSink = sink
  return () => {
    activeSink = previous
  }
}

function parseLevel(value: string | undefined): LogLevel | undefined {
  if (!value) return undefined
  const upper = value.toUpperCase()
  return Object.values(LogLevel).find((level) => level === upper)
}

export function resolveLoggerConfig(env: NodeJS.ProcessEnv = process.env): LoggerConfig {
  const nodeEnv = env.NODE_ENV === 'production' || env.NODE_ENV === 'test' ? env.NODE_ENV : 'development'
  const preset = ENV_PRESETS[nodeEnv]
  const explicitLevel = parseLevel(env.LOG_LEVEL)

  if (!explicitLevel) return preset
  return { ...preset, enabled: true, minLevel: explicitLevel }
}

function formatMeta(value: unknown): string {
  if (value instanceof Error) {
    return value.stack ?? `${value.name}: ${value.message}`
  }
  if (typeof value === 'object' && value !== null) {
    try {
      return JSON.stringify(value)
    } catch {
      return String(value)
    }
  }
  return String(value)
}

const LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
  [LogLevel.DEBUG]: chalk.gray,
  [LogLevel.INFO]: chalk.cyan,
  [LogLevel.WARN]: chalk.yellow,
  [LogLevel.ERROR]: chalk.red,
}

export class Logger {
  constructor(
    private readonly module: string,
    private readonly config: LoggerConfig = resolveLoggerConfig()
  ) {}

  private shouldLog(level: LogLevel): boolean {
    return this.config.enabled && LEVEL_ORDER[level] >= LEVEL_ORDER[this.config.minLevel]
  }

  formatLine(level: LogLevel, message: string, meta: unknown[]): string {
    const timestamp = new Date().toISOString()
    const details = meta.length > 0 ? ` ${meta.map(formatMeta).join(' ')}` : ''

    if (!this.config.colorize) {
      return `[${timestamp}] [${level}] [${this.module}] ${message}${details}`
    }

    const color = LEVEL_COLORS[level]
    return `${chalk.dim(`[${timestamp}]`)} ${color(`[${level}]`)} ${chalk.bold(`[${this.module}]`)} ${message}${chalk.dim(details)}`
  }

  private log(level: LogLevel, message: string, meta: unknown[]): void {
    if (!this.shouldLog(level)) return
    activeSink(level, this.formatLine(level, message, meta))
  }

  debug(message: string, ...meta: unknown[]): void {
    this.log(LogLevel.DEBUG, message, meta)
  }

  info(message: string, ...meta: unknown[]): void {
    this.log(LogLevel.INFO, message, meta)
  }

  warn(message: string, ...meta: unknown[]): void {
    this.log(LogLevel.WARN, message, meta)
  }

  error(message: string, ...meta: unknown[]): void {
    this.log(LogLevel.ERROR, message, meta)
  }
}

export function createLogger(module: string): Logger {
  return new Logger(module)
}
