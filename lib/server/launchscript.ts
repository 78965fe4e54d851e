/**
 * @license MIT
 * @copyright Copyright (c) 2026, GoldFrite
 */

import fs from 'node:fs/promises'
import path_ from 'node:path'
import { MSMError, ErrorType, errorMessage } from '../../types/errors'
import pathsafety from '../utils/pathsafety'
import { FORGE_ARGS_FILE, LAUNCH_SCRIPT_NAMES, scriptExtension } from './detection'

export interface LaunchScriptOptions {
  /** Jar to run, relative to the server directory. */
  jar: string
  /** [Optional: default is `java` from the `PATH`] Java executable. */
  javaPath?: string | null
  memoryMaxMb: number
  memoryMinMb?: number | null
}

function quoteSh(arg: string) {
  return /^[\w@%+=:,./-]+$/.test(arg) ? arg : `'${arg.replace(/'/g, `'\\''`)}'`
}

function quoteBat(arg: string) {
  return /^[\w@+=:,./\\-]+$/.test(arg) ? arg : `"${arg.replace(/"/g, '""')}"`
}

/**
 * Java arguments of a server: memory settings, then the jar.
 */
export function javaArgs(options: LaunchScriptOptions): string[] {
  const args: string[] = []
  if (options.memoryMinMb) args.push(`-Xms${options.memoryMinMb}M`)
  args.push(`-Xmx${options.memoryMaxMb}M`, '-jar', options.jar, 'nogui')
  return args
}

/**
 * Content of a launch script. On POSIX, the script replaces itself with Java (`exec`), so the
 * process that is started is Java itself.
 */
export function renderLaunchScript(options: LaunchScriptOptions, platform: NodeJS.Platform = process.platform): string {
  const java = options.javaPath ?? 'java'
  const args = javaArgs(options)
  if (platform === 'win32') {
    return ['@echo off', 'cd /d "%~dp0"', [java, ...args].map(quoteBat).join(' '), ''].join('\r\n')
  }
  return ['#!/bin/sh', 'cd "$(dirname "$0")" || exit 1', 'exec ' + [java, ...args].map(quoteSh).join(' '), ''].join('\n')
}

/**
 * Write `start_server.sh` (`start_server.bat` on Windows) in the server directory.
 * @returns The path of the script.
 */
export async function writeLaunchScript(dir: string, options: LaunchScriptOptions, platform: NodeJS.Platform = process.platform) {
  const file = path_.join(dir, LAUNCH_SCRIPT_NAMES[0] + scriptExtension(platform))
  await pathsafety.atomicWriteFile(file, renderLaunchScript(options, platform))
  if (platform !== 'win32') await fs.chmod(file, 0o755)
  return file
}

/**
 * Set the memory arguments of a Forge server in `user_jvm_args.txt`, keeping the other lines.
 */
export async function writeForgeJvmArgs(dir: string, memoryMaxMb: number, memoryMinMb: number | null) {
  const file = path_.join(dir, FORGE_ARGS_FILE)
  let lines: string[] = []
  try {
    lines = (await fs.readFile(file, 'utf-8')).split(/\r?\n/)
  } catch (err) {
    if (!(err instanceof Error && 'code' in err && err.code === 'ENOENT')) {
      throw new MSMError(ErrorType.FILE_ERROR, `Cannot read ${file}: ${errorMessage(err)}`, { path: file })
    }
  }

  const kept = lines.filter((line) => !/^\s*-Xm[xs]\S*\s*$/.test(line))
  while (kept.length > 0 && kept[kept.length - 1] === '') kept.pop()
  if (memoryMinMb) kept.push(`-Xms${memoryMinMb}M`)
  kept.push(`-Xmx${memoryMaxMb}M`)
  await pathsafety.atomicWriteFile(file, kept.join('\n') + '\n')
}

/**
 * Executable and arguments that run a launch script, without a shell command line:
 * `cmd.exe /d /c script.bat` on Windows, `/bin/sh script.sh` elsewhere.
 */
export function scriptCommand(script: string, platform: NodeJS.Platform = process.platform): { executable: string; args: string[] } {
  if (platform === 'win32') return { executable: process.env['ComSpec'] ?? 'cmd.exe', args: ['/d', '/c', script] }
  return { executable: '/bin/sh', args: [script] }
}
