import pino from 'pino'
import type { Logger, LoggerOptions } from 'pino'

// pinoレベル → Cloud Logging severity マッピング
export const SEVERITY_MAP: Record<number, string> = {
  10: 'DEBUG', // trace
  20: 'DEBUG', // debug
  30: 'INFO', // info
  40: 'WARNING', // warn
  50: 'ERROR', // error
  60: 'CRITICAL', // fatal
}

export interface LoggerSettings {
  readonly level: string
  readonly serviceName: string
  readonly environment: string
}

export function buildLoggerOptions(settings: LoggerSettings): LoggerOptions {
  return {
    level: settings.level,
    formatters: {
      level(_label, number) {
        return {
          severity: SEVERITY_MAP[number] || 'DEFAULT',
          'severity.text': SEVERITY_MAP[number] || 'DEFAULT',
        }
      },
    },
    // ISO 8601タイムスタンプ
    timestamp: pino.stdTimeFunctions.isoTime,
    // pinoデフォルトの"pid","hostname"を除外
    base: {
      'service.name': settings.serviceName,
      'deployment.environment': settings.environment,
    },
    // Cloud Loggingが "message" フィールドを期待
    messageKey: 'message',
  }
}

export function createLogger(settings: LoggerSettings, destination?: pino.DestinationStream): Logger {
  const options = buildLoggerOptions(settings)
  return destination ? pino(options, destination) : pino(options)
}

export const logger: Logger = createLogger({
  level: process.env.LOG_LEVEL || 'info',
  serviceName: process.env.SERVICE_NAME || 'docpipe-backend',
  environment: process.env.NODE_ENV || 'development',
})

export type { Logger }
