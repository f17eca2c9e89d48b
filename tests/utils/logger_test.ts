import { afterEach, describe, expect, it, vi } from 'vitest'
import { consoleSink, isLogLevel, Logger, logger, type LogLevel } from '../../src/utils/logger.ts'

function capture(minLevel: LogLevel = 'debug', prefix?: string) {
  const logs: Array<{ level: LogLevel; message: string; args: unknown[] }> = []
  const testLogger = new Logger({
    enabled: true,
    minLevel,
    prefix,
    output: (level, message, ...args) => {
      logs.push({ level, message, args })
    },
  })
  return { logs, testLogger }
}

describe('Logger', () => {
  it('default instance exists and is enabled at info', () => {
    const config = logger.getConfig()
    expect(config.enabled).toBe(true)
    expect(config.minLevel).toBe('info')
    expect(config.prefix).toBe('tvgen')
  })

  it('passes every level and its arguments to the output', () => {
    const { logs, testLogger } = capture()

    testLogger.debug('debug message', { data: 1 })
    testLogger.info('info message', { data: 2 })
    testLogger.warn('warn message', { data: 3 })
    testLogger.error('error message', { data: 4 })

    expect(logs).toEqual([
      { level: 'debug', message: 'debug message', args: [{ data: 1 }] },
      { level: 'info', message: 'info message', args: [{ data: 2 }] },
      { level: 'warn', message: 'warn message', args: [{ data: 3 }] },
      { level: 'error', message: 'error message', args: [{ data: 4 }] },
    ])
  })

  it('filters below the minimum level', () => {
    const { logs, testLogger } = capture('warn')

    testLogger.debug('hidden')
    testLogger.info('hidden')
    testLogger.warn('shown')
    testLogger.error('shown')

    expect(logs.map((log) => log.level)).toEqual(['warn', 'error'])
    expect(testLogger.isLevelEnabled('info')).toBe(false)
    expect(testLogger.isLevelEnabled('error')).toBe(true)
  })

  it('emits nothing when disabled', () => {
    const { logs, testLogger } = capture()
    testLogger.configure({ enabled: false })

    testLogger.error('hidden')

    expect(logs).toEqual([])
    expect(testLogger.isLevelEnabled('error')).toBe(false)
  })

  it('prefixes messages', () => {
    const { logs, testLogger } = capture('debug', 'tvgen')

    testLogger.info('ready')

    expect(logs[0]?.message).toBe('[tvgen] ready')
  })

  it('child loggers join prefixes and share the sink', () => {
    const { logs, testLogger } = capture('info', 'tvgen')
    const child = testLogger.child('coin')

    child.info('collected')
    child.debug('hidden')

    expect(logs).toEqual([{ level: 'info', message: '[tvgen:coin] collected', args: [] }])
  })

  it('configure keeps the existing output when none is given', () => {
    const { logs, testLogger } = capture('error')
    testLogger.configure({ minLevel: 'info' })

    testLogger.info('now visible')

    expect(logs).toHaveLength(1)
    expect(testLogger.getConfig().minLevel).toBe('info')
  })

  it('recognises log level names', () => {
    expect(isLogLevel('warn')).toBe(true)
    expect(isLogLevel('verbose')).toBe(false)
  })
})

describe('consoleSink', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('writes info to stdout and the other levels to stderr', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})
    const error = vi.spyOn(console, 'error').mockImplementation(() => {})

    consoleSink('info', 'ready', 1)
    consoleSink('debug', 'detail')
    consoleSink('warn', 'careful')

    expect(log).toHaveBeenCalledTimes(1)
    expect(log.mock.calls[0]).toEqual([expect.stringMatching(/^\[\d{4}-\d\d-\d\dT[^\]]+Z\] \[INFO\] ready$/), 1])
    expect(error.mock.calls.map(([line]) => String(line).replace(/^\[[^\]]+\] /, ''))).toEqual([
      '[DEBUG] detail',
      '[WARN] careful',
    ])
  })
})
