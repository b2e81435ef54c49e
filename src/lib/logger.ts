/**
 * Structured logger (pino).
 *
 * JSON lines in production, pino-pretty in development, silent under test.
 * Store tasks log through `logger.child({ store })`.
 */

import pino from 'pino'
import { config } from './config.js'

export const logger = pino({
  level: config.isTest ? 'silent' : config.log.level,
  transport: config.isDev
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      }
    : undefined,
})

export type Logger = pino.Logger
