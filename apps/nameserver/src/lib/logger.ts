/**
 * Structured Logger using pino - one child logger per server component.
 */

import { getEnvVar, getLogLevel, isProductionEnv } from '@hopdns/config'
import pino from 'pino'

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void
  info(message: string, data?: Record<string, unknown>): void
  warn(message: string, data?: Record<string, unknown>): void
  error(message: string, data?: Record<string, unknown>): void
}

const useJson = getEnvVar('LOG_FORMAT') === 'json' || isProductionEnv()

const baseLogger = pino({
  level: getLogLevel(),
  transport: !useJson
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      }
    : undefined,
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
})

/**
 * Binds `component` on every line written through `parent`
 */
export class PinoLogger implements Logger {
  private logger: pino.Logger

  constructor(parent: pino.Logger, component: string) {
    this.logger = parent.child({ component })
  }

  debug(message: string, data?: Record<string, unknown>) {
    data ? this.logger.debug(data, message) : this.logger.debug(message)
  }

  info(message: string, data?: Record<string, unknown>) {
    data ? this.logger.info(data, message) : this.logger.info(message)
  }

  warn(message: string, data?: Record<string, unknown>) {
    data ? this.logger.warn(data, message) : this.logger.warn(message)
  }

  error(message: string, data?: Record<string, unknown>) {
    data ? this.logger.error(data, message) : this.logger.error(message)
  }
}

export function createLogger(component: string): Logger {
  return new PinoLogger(baseLogger, component)
}
