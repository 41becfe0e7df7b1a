import { AsyncLocalStorage } from 'async_hooks'
import fs from 'fs'
import path from 'path'
import { createRequire } from 'module'
import pino, { type DestinationStream, type LevelWithSilent } from 'pino'
import { createStream, type RotatingFileStream } from 'rotating-file-stream'

const env = process.env.NODE_ENV || 'development'
const DEFAULT_DEBUG_LOG_FILE = 'powerline-tabs-debug.jsonl'
const DEFAULT_DEBUG_LOG_SIZE: SizeString = '10M'
const DEFAULT_DEBUG_LOG_MAX_FILES = 5

type LogContext = {
  tabId?: number
  tabIndex?: number
}

const logContext = new AsyncLocalStorage<LogContext>()
const require = createRequire(import.meta.url)

type SizeString = `${number}B` | `${number}K` | `${number}M` | `${number}G`

type DebugFileStreamOptions = {
  size?: SizeString
  maxFiles?: number
}

export function isTestRuntime(envVars: NodeJS.ProcessEnv): boolean {
  return (
    (envVars.NODE_ENV || 'development') === 'test' ||
    envVars.VITEST === 'true' ||
    envVars.VITEST === '1' ||
    envVars.VITEST_POOL_ID !== undefined
  )
}

const LOG_LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']

function isLogLevel(value: string): value is LevelWithSilent {
  return LOG_LEVELS.some((candidate) => candidate === value)
}

/** An explicit LOG_LEVEL wins; otherwise silent under test and debug elsewhere. */
export function resolveLogLevel(envVars: NodeJS.ProcessEnv = process.env): LevelWithSilent {
  const explicit = envVars.LOG_LEVEL?.trim().toLowerCase()
  if (explicit && isLogLevel(explicit)) return explicit
  if (isTestRuntime(envVars)) return 'silent'
  return 'debug'
}

export function withLogContext<T>(context: LogContext, fn: () => T): T {
  return logContext.run(context, fn)
}

export function resolveDebugLogPath(envVars: NodeJS.ProcessEnv = process.env): string | null {
  const explicitPath = envVars.LOG_DEBUG_PATH?.trim()
  if (explicitPath) return path.resolve(explicitPath)

  const logDir = envVars.POWERLINE_TABS_LOG_DIR?.trim()
  if (!logDir) return null
  return path.join(path.resolve(logDir), DEFAULT_DEBUG_LOG_FILE)
}

export function createDebugFileStream(filePath: string, options: DebugFileStreamOptions = {}): RotatingFileStream {
  const size = options.size ?? DEFAULT_DEBUG_LOG_SIZE
  const maxFiles = options.maxFiles ?? DEFAULT_DEBUG_LOG_MAX_FILES
  const dir = path.dirname(filePath)
  fs.mkdirSync(dir, { recursive: true })
  return createStream(path.basename(filePath), { path: dir, size, maxFiles })
}

function createPinoOptions(level: LevelWithSilent): pino.LoggerOptions {
  return {
    level,
    base: {
      app: 'powerline-tabs',
      env,
    },
    formatters: {
      level(label: string, number: number) {
        return { level: number, severity: label }
      },
    },
    mixin() {
      // pino mutates the object returned by `mixin()`; hand back a fresh copy each call.
      const ctx = logContext.getStore()
      return ctx ? { ...ctx } : {}
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  }
}

function createConsoleStream(shouldPrettyPrint: boolean): DestinationStream {
  if (!shouldPrettyPrint) return pino.destination(2)
  const pinoPretty = require('pino-pretty') as typeof import('pino-pretty')
  return pinoPretty({ colorize: true, translateTime: 'SYS:standard', destination: 2 })
}

function attachDebugStreamWarnings(
  stream: RotatingFileStream,
  consoleLogger: pino.Logger,
  filePath: string,
) {
  let warned = false
  const warnOnce = (err: Error, event: string) => {
    if (warned) return
    warned = true
    consoleLogger.warn({ err, filePath, event }, 'Debug log stream issue')
  }
  stream.on('error', (err: Error) => warnOnce(err, 'error'))
  stream.on('warning', (err: Error) => warnOnce(err, 'warning'))
}

export function createLogger(destination?: DestinationStream, envVars: NodeJS.ProcessEnv = process.env) {
  const level = resolveLogLevel(envVars)
  if (destination) {
    return pino(createPinoOptions(level), destination)
  }

  const shouldPrettyPrint = env !== 'production' && !isTestRuntime(envVars)
  const consoleStream = createConsoleStream(shouldPrettyPrint)
  const consoleLogger = pino(createPinoOptions(level), consoleStream)
  const streams: Array<{ stream: DestinationStream; level: LevelWithSilent }> = [
    { stream: consoleStream, level: 'info' },
  ]

  const debugLogPath = resolveDebugLogPath(envVars)
  if (debugLogPath) {
    try {
      const debugStream = createDebugFileStream(debugLogPath)
      streams.push({ stream: debugStream, level: 'debug' })
      attachDebugStreamWarnings(debugStream, consoleLogger, debugLogPath)
    } catch (err) {
      consoleLogger.warn({ err, filePath: debugLogPath }, 'Debug log file disabled')
    }
  }

  return pino(createPinoOptions(level), pino.multistream(streams))
}

export const logger = createLogger()
