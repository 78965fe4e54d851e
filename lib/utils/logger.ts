/**
 * @license MIT
 * @copyright Copyright (c) 2026, GoldFrite
 */

import log from 'electron-log/node'
import path_ from 'node:path'
import type { LogLevel } from '../../types/config'

export type Logger = ReturnType<typeof log.scope>

// Nothing is written to disk until the application data folder is known.
log.transports.file.level = false
log.transports.console.level = process.env['MSM_LOG_CONSOLE'] === '1' ? 'debug' : false

/**
 * Enable the file transport (`<dir>/logs/main.log`).
 * @param dir The application data folder.
 * @param level Minimum level written to the file.
 */
export function initLogger(dir: string, level: LogLevel = 'info') {
  const file = path_.join(dir, 'logs', 'main.log')
  log.transports.file.resolvePathFn = () => file
  log.transports.file.level = level
  return file
}

/**
 * Get a logger labelled with the name of the component.
 */
export function getLogger(scope: string): Logger {
  return log.scope(scope)
}
