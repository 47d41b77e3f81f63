import pino from 'pino'

/**
 * Logger factory - creates structured logger instances
 */
export function createLogger(name: string) {
  return pino({
    name,
    level: process.env.LOG_LEVEL || 'info',
    formatters: {
      level: (label) => {
        return { level: label }
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  })
}

export type Logger = pino.Logger
