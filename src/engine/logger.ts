import pino from 'pino'

const env = process.env.NODE_ENV
const isProduction = env === 'production'
const isTest = env === 'test' || process.env.VITEST !== undefined

const transport = isProduction || isTest
  ? undefined
  : {
      target: 'pino-pretty',
      options: {
        colorize: true,
        ignore: 'pid,hostname',
        translateTime: 'SYS:standard',
      },
    }

export const logger = pino({
  name: 'spellforge',
  level: process.env.LOG_LEVEL || (isTest ? 'silent' : 'info'),
  transport,
})

export type Logger = typeof logger
