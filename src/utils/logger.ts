import pino, { type Logger } from 'pino'

export const logger = pino({
  name: 'channel-export',
  level: process.env.LOG_LEVEL || 'info',
})

/** Child logger tagged with module bindings */
export function createLogger(bindings: Record<string, unknown>): Logger {
  return logger.child(bindings)
}
