/**
 * @license MIT
 * @copyright Copyright (c) 2026, GoldFrite
 */

import { execFile } from 'node:child_process'
import { promisify } from 'node:util'
import type { ResourceSample } from '../../types/server'
import { errorMessage } from '../../types/errors'
import type { Logger } from '../utils/logger'

const execFileAsync = promisify(execFile)

/**
 * Reads the CPU and memory usage of a process.
 */
export interface ResourceSampler {
  /**
   * @returns `null` if the process does not exist (anymore).
   */
  sample(pid: number): Promise<ResourceSample | null>
}

/**
 * Parse the output of `ps -o %cpu=,rss= -p <pid>`.
 */
export function parsePsOutput(output: string, at: number = Date.now()): ResourceSample | null {
  const fields = output.trim().split(/\s+/)
  if (fields.length < 2) return null
  const cpu = parseFloat(fields[0].replace(',', '.'))
  const rssKb = parseInt(fields[1], 10)
  if (!Number.isFinite(cpu) || !Number.isFinite(rssKb)) return null
  return { at, cpuPercent: cpu, memoryMb: Math.round((rssKb / 1024) * 10) / 10 }
}

/**
 * Parse the output of `tasklist /FI "PID eq <pid>" /FO CSV /NH`. `tasklist` reports no CPU usage.
 */
export function parseTasklistOutput(output: string, at: number = Date.now()): ResourceSample | null {
  const line = output.split(/\r?\n/).find((l) => l.startsWith('"'))
  if (!line) return null
  const fields = line.split('","').map((f) => f.replace(/^"|"$/g, ''))
  const memory = fields[4]
  if (!memory) return null
  const kb = parseInt(memory.replace(/[^\d]/g, ''), 10)
  if (!Number.isFinite(kb)) return null
  return { at, cpuPercent: 0, memoryMb: Math.round((kb / 1024) * 10) / 10 }
}

/**
 * Sampler based on the system tools: `ps` on POSIX, `tasklist` on Windows.
 */
export class SystemResourceSampler implements ResourceSampler {
  private readonly logger: Logger

  constructor(logger: Logger) {
    this.logger = logger
  }

  async sample(pid: number): Promise<ResourceSample | null> {
    try {
      if (process.platform === 'win32') {
        const { stdout } = await execFileAsync('tasklist', ['/FI', `PID eq ${pid}`, '/FO', 'CSV', '/NH'], { windowsHide: true, timeout: 5000 })
        return parseTasklistOutput(stdout)
      }
      const { stdout } = await execFileAsync('ps', ['-o', '%cpu=,rss=', '-p', String(pid)], { timeout: 5000 })
      return parsePsOutput(stdout)
    } catch (err) {
      // ps exits with 1 when the process is gone.
      this.logger.debug(`Cannot sample process ${pid}: ${errorMessage(err)}`)
      return null
    }
  }
}
