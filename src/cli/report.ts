/**
 * Fatal error reporting for the CLI
 */

import type { Logger } from 'pino'
import { ExportError, HttpError, NetworkError } from '../types.js'

/**
 * Log a run-ending error. Errors go under `err` so pino's serializer keeps
 * their type, message and stack.
 */
export function reportFatal(log: Logger, error: unknown): void {
  if (error instanceof HttpError) {
    log.fatal({ status: error.status, body: error.body }, error.message)
  } else if (error instanceof NetworkError) {
    log.fatal({ err: error.cause }, error.message)
  } else if (error instanceof ExportError) {
    log.fatal(error.message)
  } else {
    log.fatal({ err: error }, 'Unhandled error')
  }
}
