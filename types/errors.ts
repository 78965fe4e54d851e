/**
 * @license MIT
 * @copyright Copyright (c) 2025, GoldFrite
 */

/**
 * The error class for MSM Core.
 */
export class MSMError extends Error {
  code: ErrorCode
  details: ErrorDetails

  constructor(code: ErrorCode, message: string, details: ErrorDetails = {}) {
    super(message)
    this.name = 'MSMError'
    this.code = code
    this.details = details
  }

  /**
   * The category of the error (stable, machine-readable).
   */
  get category(): ErrorCategory {
    return errorCategory(this.code)
  }
}

export interface ErrorDetails {
  /** Exit code of the process, for process errors. */
  exitCode?: number | null
  /** Last captured output lines of the process, for process errors. */
  lastLines?: string[]
  /** Stage at which an installation failed. */
  stage?: string
  /** Affected server ID. */
  serverId?: string
  /** Affected path. */
  path?: string
}

export const ErrorType = {
  UNKNOWN_ERROR: 'UNKNOWN_ERROR',
  CONFIG_ERROR: 'CONFIG_ERROR',
  NOT_FOUND: 'NOT_FOUND',
  NET_ERROR: 'NET_ERROR',
  FETCH_ERROR: 'FETCH_ERROR',
  DOWNLOAD_ERROR: 'DOWNLOAD_ERROR',
  HASH_ERROR: 'HASH_ERROR',
  PATH_TRAVERSAL: 'PATH_TRAVERSAL',
  UNVERIFIABLE: 'UNVERIFIABLE',
  EXEC_ERROR: 'EXEC_ERROR',
  PROCESS_ERROR: 'PROCESS_ERROR',
  JAVA_ERROR: 'JAVA_ERROR',
  INSTALL_ERROR: 'INSTALL_ERROR',
  NOT_RUNNING: 'NOT_RUNNING',
  BUSY: 'BUSY',
  CONFLICT: 'CONFLICT',
  CANCELLED: 'CANCELLED',
  FILE_ERROR: 'FILE_ERROR'
} as const

export type ErrorCode = (typeof ErrorType)[keyof typeof ErrorType]

export type ErrorCategory = 'CONFIGURATION' | 'NETWORK' | 'VERIFICATION' | 'PROCESS' | 'CONCURRENCY' | 'FILE' | 'UNKNOWN'

const CATEGORIES: Record<ErrorCode, ErrorCategory> = {
  UNKNOWN_ERROR: 'UNKNOWN',
  CONFIG_ERROR: 'CONFIGURATION',
  NOT_FOUND: 'CONFIGURATION',
  NET_ERROR: 'NETWORK',
  FETCH_ERROR: 'NETWORK',
  DOWNLOAD_ERROR: 'NETWORK',
  HASH_ERROR: 'VERIFICATION',
  PATH_TRAVERSAL: 'VERIFICATION',
  UNVERIFIABLE: 'VERIFICATION',
  EXEC_ERROR: 'PROCESS',
  PROCESS_ERROR: 'PROCESS',
  JAVA_ERROR: 'PROCESS',
  INSTALL_ERROR: 'PROCESS',
  NOT_RUNNING: 'CONCURRENCY',
  BUSY: 'CONCURRENCY',
  CONFLICT: 'CONCURRENCY',
  CANCELLED: 'CONCURRENCY',
  FILE_ERROR: 'FILE'
}

/**
 * Get the category of an error code.
 */
export function errorCategory(code: ErrorCode): ErrorCategory {
  return CATEGORIES[code]
}

/**
 * Get the message of any thrown value.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
