/**
 * Leveled logger used by the collector, the batch generator and the CLI
 * @module
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

/** Every level, lowest first */
export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error']

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value)
}

/** Receives every message that passes the level filter */
export type LogSink = (level: LogLevel, message: string, ...args: unknown[]) => void

export type LoggerConfig = {
  enabled: boolean
  /** Default: `info` */
  minLevel?: LogLevel
  /** Rendered as `[prefix] ` before each message */
  prefix?: string
  output?: LogSink
}

/**
 * `[<ISO time>] [LEVEL] message`. `info` goes to stdout and the other
 * levels to stderr, so `TVGEN_LOG_LEVEL=warn` leaves stdout to the command.
 */
export const consoleSink: LogSink = (level, message, ...args) => {
  const line = `[${new Date().toISOString()}] [${level.toUpperCase()}] ${message}`
  if (level === 'info') {
    console.log(line, ...args)
  } else {
    console.error(line, ...args)
  }
}

/**
 * @example
 * ```ts
 * const log = logger.child('coin')
 * log.warn('No symbols found in metainfo, skipping scan')
 * ```
 */
export class Logger {
  private settings: Required<LoggerConfig>

  constructor({ enabled, minLevel = 'info', prefix = '', output = consoleSink }: LoggerConfig) {
    this.settings = { enabled, minLevel, prefix, output }
  }

  isLevelEnabled(level: LogLevel): boolean {
    return this.settings.enabled && LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.settings.minLevel)
  }

  debug(message: string, ...args: unknown[]): void {
    this.emit('debug', message, args)
  }

  info(message: string, ...args: unknown[]): void {
    this.emit('info', message, args)
  }

  warn(message: string, ...args: unknown[]): void {
    this.emit('warn', message, args)
  }

  error(message: string, ...args: unknown[]): void {
    this.emit('error', message, args)
  }

  /** Same sink and level, prefix extended with `:` (`tvgen:coin`) */
  child(prefix: string): Logger {
    const { prefix: parent } = this.settings
    return new Logger({ ...this.settings, prefix: parent ? `${parent}:${prefix}` : prefix })
  }

  /** Fields left out keep their current value */
  configure(changes: Partial<LoggerConfig>): void {
    this.settings = {
      enabled: changes.enabled ?? this.settings.enabled,
      minLevel: changes.minLevel ?? this.settings.minLevel,
      prefix: changes.prefix ?? this.settings.prefix,
      output: changes.output ?? this.settings.output,
    }
  }

  getConfig(): Readonly<Required<LoggerConfig>> {
    return { ...this.settings }
  }

  private emit(level: LogLevel, message: string, args: unknown[]): void {
    if (!this.isLevelEnabled(level)) return
    const { prefix, output } = this.settings
    output(level, prefix ? `[${prefix}] ${message}` : message, ...args)
  }
}

/** Shared instance; the CLI sets its level from the loaded configuration */
export const logger: Logger = new Logger({ enabled: true, minLevel: 'info', prefix: 'tvgen' })
