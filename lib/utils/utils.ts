/**
 * @license MIT
 * @copyright Copyright (c) 2026, GoldFrite
 */

import path_ from 'node:path'
import os from 'node:os'

/**
 * Parse a version string into numbers: `'v1.6.6'` -> `[1, 6, 6]`. Pre-release and build suffixes
 * (`-beta.1`, `+abc`) are returned separately.
 * @returns `null` if the string contains no numeric part.
 */
function parseVersion(version: string): { parts: number[]; prerelease: string | null } | null {
  const clean = version.trim().replace(/^[vV]/, '')
  const [main, ...rest] = clean.split('+')[0].split('-')
  const parts = main.split('.').filter((p) => /^\d+$/.test(p)).map((p) => parseInt(p, 10))
  if (parts.length === 0) return null
  return { parts, prerelease: rest.length > 0 ? rest.join('-') : null }
}

/**
 * Compare two versions with semantic ordering (not lexical): `1.10.0` > `1.9.9`, and a
 * pre-release is lower than its release (`1.6.6-rc1` < `1.6.6`).
 * @returns A negative number if `a < b`, positive if `a > b`, `0` if equal. Unparsable versions
 * are lower than any parsable one.
 */
function compareVersions(a: string, b: string): number {
  const va = parseVersion(a)
  const vb = parseVersion(b)
  if (!va || !vb) return (va ? 1 : 0) - (vb ? 1 : 0)

  const length = Math.max(va.parts.length, vb.parts.length)
  for (let i = 0; i < length; i++) {
    const diff = (va.parts[i] ?? 0) - (vb.parts[i] ?? 0)
    if (diff !== 0) return diff
  }

  if (va.prerelease === vb.prerelease) return 0
  if (va.prerelease === null) return 1
  if (vb.prerelease === null) return -1
  return va.prerelease.localeCompare(vb.prerelease, 'en', { numeric: true })
}

/**
 * Whether a Minecraft release version is at least `min` (eg. `isGameVersionAtLeast('1.20.1', [1, 14])`).
 * Snapshots and unparsable versions return `false`.
 */
function isGameVersionAtLeast(gameVersion: string, min: number[]): boolean {
  if (!/^\d+\.\d+(\.\d+)?$/.test(gameVersion)) return false
  const parts = gameVersion.split('.').map((p) => parseInt(p, 10))
  for (let i = 0; i < min.length; i++) {
    const diff = (parts[i] ?? 0) - min[i]
    if (diff !== 0) return diff > 0
  }
  return true
}

/**
 * Per-user folder for application data of installed applications.
 */
function getLocalAppData() {
  if (process.platform === 'win32') {
    return process.env['LOCALAPPDATA'] ?? path_.join(os.homedir(), 'AppData', 'Local')
  }
  if (process.platform === 'darwin') {
    return path_.join(os.homedir(), 'Library', 'Application Support')
  }
  return process.env['XDG_DATA_HOME'] ?? path_.join(os.homedir(), '.local', 'share')
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const timer = setTimeout(resolve, ms)
    signal?.addEventListener(
      'abort',
      () => {
        clearTimeout(timer)
        resolve()
      },
      { once: true }
    )
  })
}

/**
 * Timestamp usable in a file name (eg. `2026-01-31_18-05-12`).
 */
function fileTimestamp(date: Date = new Date()) {
  const pad = (n: number) => n.toString().padStart(2, '0')
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
    `_${pad(date.getHours())}-${pad(date.getMinutes())}-${pad(date.getSeconds())}`
  )
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export default { parseVersion, compareVersions, isGameVersionAtLeast, getLocalAppData, sleep, fileTimestamp, isRecord }
