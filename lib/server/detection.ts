/**
 * @license MIT
 * @copyright Copyright (c) 2026, GoldFrite
 */

import AdmZip from 'adm-zip'
import fs from 'node:fs/promises'
import path_ from 'node:path'
import type { DetectedServer, LoaderKind } from '../../types/server'
import { errorMessage } from '../../types/errors'
import pathsafety from '../utils/pathsafety'
import utils from '../utils/utils'
import properties from './properties'
import { getLogger } from '../utils/logger'

const logger = getLogger('Detection')

export const VANILLA_JARS = ['server.jar', 'minecraft_server.jar']
export const FABRIC_JARS = ['fabric-server-launch.jar', 'fabric-server-launcher.jar']
export const FORGE_LIBRARIES = path_.join('libraries', 'net', 'minecraftforge', 'forge')
export const FORGE_ARGS_FILE = 'user_jvm_args.txt'
const FABRIC_LOADER_LIBRARIES = path_.join('libraries', 'net', 'fabricmc', 'fabric-loader')
const MINECRAFT_LIBRARIES = path_.join('libraries', 'net', 'minecraft', 'server')

/** Launch script names, in priority order (without extension). */
export const LAUNCH_SCRIPT_NAMES = ['start_server', 'run', 'start', 'server']

const FORGE_JAR = /^forge-(\d+\.\d+(?:\.\d+)?)-(\d+\.\d+(?:\.\d+)*)(?:-[\w.-]+)?\.jar$/i
const FORGE_DIR = /^(\d+\.\d+(?:\.\d+)?)-(\d+\.\d+(?:\.\d+)*)$/
const FABRIC_LOG = /(?:Fabric Loader|fabric-loader) (\d+\.\d+\.\d+)/
const VANILLA_LOG = /Starting minecraft server version (\S+)/
const MEMORY_ARG = /-Xm([xs])(\d+)([kKmMgG]?)\b/g

/**
 * Extension of launch scripts on a platform.
 */
export function scriptExtension(platform: NodeJS.Platform = process.platform) {
  return platform === 'win32' ? '.bat' : '.sh'
}

/**
 * Find the launch script of a server, by priority order.
 * @returns The absolute path, `null` if none exists.
 */
export async function findLaunchScript(dir: string, platform: NodeJS.Platform = process.platform): Promise<string | null> {
  for (const name of LAUNCH_SCRIPT_NAMES) {
    const file = path_.join(dir, name + scriptExtension(platform))
    if (await isFile(file)) return file
  }
  return null
}

/**
 * Find the jar that runs the server.
 * @returns The file name (relative to `dir`), `null` if none exists.
 */
export async function findServerJar(dir: string, kind: LoaderKind): Promise<string | null> {
  const jars = await listJars(dir)
  const first = (names: string[]) => names.find((name) => jars.includes(name)) ?? null

  switch (kind) {
    case 'fabric':
      return first(FABRIC_JARS) ?? first(VANILLA_JARS)
    case 'forge':
      return (
        jars.find((name) => FORGE_JAR.test(name) && !/installer/i.test(name)) ??
        jars.find((name) => /forge/i.test(name) && !/installer/i.test(name)) ??
        first(VANILLA_JARS)
      )
    case 'vanilla':
      return first(VANILLA_JARS)
  }
}

/**
 * Detect the loader of a server directory.
 * @returns `null` if the directory does not look like a server.
 */
export async function detectLoaderKind(dir: string): Promise<LoaderKind | null> {
  const jars = await listJars(dir)
  if (FABRIC_JARS.some((name) => jars.includes(name)) || (await pathsafety.exists(path_.join(dir, '.fabric')))) return 'fabric'
  if ((await pathsafety.exists(path_.join(dir, FORGE_LIBRARIES))) || jars.some((name) => /forge/i.test(name) && !/installer/i.test(name))) {
    return 'forge'
  }
  if (VANILLA_JARS.some((name) => jars.includes(name))) return 'vanilla'
  return null
}

/**
 * Inspect a server directory: loader, versions, launch script, EULA, port and memory settings.
 * @returns `null` if the directory has neither a launch script nor a server jar.
 */
export async function detectServer(dir: string, platform: NodeJS.Platform = process.platform): Promise<DetectedServer | null> {
  const launchScript = await findLaunchScript(dir, platform)
  const loaderKind = await detectLoaderKind(dir)
  if (!launchScript && !loaderKind) return null

  const versions = loaderKind ? await detectVersions(dir, loaderKind) : { gameVersion: null, loaderVersion: null }
  const props = await properties.read(path_.join(dir, 'server.properties'))
  const port = props['server-port'] ? parseInt(props['server-port'], 10) : NaN

  const memorySources = [launchScript, path_.join(dir, FORGE_ARGS_FILE)]
  let memory: { maxMb: number | null; minMb: number | null } = { maxMb: null, minMb: null }
  for (const source of memorySources) {
    if (!source) continue
    const found = parseMemoryArgs(await readText(source))
    memory = { maxMb: memory.maxMb ?? found.maxMb, minMb: memory.minMb ?? found.minMb }
  }

  return {
    path: dir,
    loaderKind,
    gameVersion: versions.gameVersion,
    loaderVersion: versions.loaderVersion,
    launchScript,
    eulaAccepted: await isEulaAccepted(dir),
    port: Number.isInteger(port) && port > 0 && port < 65536 ? port : null,
    memoryMaxMb: memory.maxMb,
    memoryMinMb: memory.minMb
  }
}

/**
 * Minecraft and loader versions of a server, from its libraries, jars and logs.
 */
export async function detectVersions(dir: string, kind: LoaderKind): Promise<{ gameVersion: string | null; loaderVersion: string | null }> {
  let gameVersion: string | null = null
  let loaderVersion: string | null = null

  if (kind === 'forge') {
    const dirs = (await listDir(path_.join(dir, FORGE_LIBRARIES))).filter((name) => FORGE_DIR.test(name))
    const jars = (await listJars(dir)).filter((name) => FORGE_JAR.test(name))
    const match = newest(dirs.map((name) => FORGE_DIR.exec(name))) ?? newest(jars.map((name) => FORGE_JAR.exec(name)))
    if (match) {
      gameVersion = match[1]
      loaderVersion = match[2]
    }
  }

  if (kind === 'fabric') {
    const versions = (await listDir(path_.join(dir, FABRIC_LOADER_LIBRARIES))).filter((name) => utils.parseVersion(name))
    versions.sort(utils.compareVersions)
    loaderVersion = versions.pop() ?? null
  }

  if (!gameVersion) gameVersion = await readJarVersion(dir)
  if (!gameVersion) {
    const libs = (await listDir(path_.join(dir, MINECRAFT_LIBRARIES))).map((name) => name.split('-')[0]).filter((name) => /^\d+\.\d+/.test(name))
    libs.sort(utils.compareVersions)
    gameVersion = libs.pop() ?? null
  }

  if (!gameVersion || (kind === 'fabric' && !loaderVersion)) {
    const log = await readText(path_.join(dir, 'logs', 'latest.log'))
    gameVersion = gameVersion ?? VANILLA_LOG.exec(log)?.[1] ?? null
    if (kind === 'fabric') loaderVersion = loaderVersion ?? FABRIC_LOG.exec(log)?.[1] ?? null
  }

  return { gameVersion, loaderVersion }
}

/**
 * `eula.txt` contains `eula=true`.
 */
export async function isEulaAccepted(dir: string) {
  const text = await readText(path_.join(dir, 'eula.txt'))
  return /^\s*eula\s*=\s*true\s*$/im.test(text)
}

/**
 * Read `-Xmx` / `-Xms` from a command line or an arguments file.
 */
export function parseMemoryArgs(text: string): { maxMb: number | null; minMb: number | null } {
  const result: { maxMb: number | null; minMb: number | null } = { maxMb: null, minMb: null }
  for (const match of text.matchAll(MEMORY_ARG)) {
    const value = parseInt(match[2], 10)
    const unit = match[3].toLowerCase()
    const mb = unit === 'g' ? value * 1024 : unit === 'k' ? Math.floor(value / 1024) : unit === 'm' ? value : Math.floor(value / 1024 / 1024)
    if (match[1] === 'x') result.maxMb = mb
    else result.minMb = mb
  }
  return result
}

/**
 * Minecraft version from `version.json` in the vanilla server jar.
 */
async function readJarVersion(dir: string): Promise<string | null> {
  for (const name of VANILLA_JARS) {
    const jar = path_.join(dir, name)
    if (!(await isFile(jar))) continue
    try {
      const entry = new AdmZip(jar).getEntry('version.json')
      if (!entry) continue
      const data: unknown = JSON.parse(entry.getData().toString('utf-8'))
      if (utils.isRecord(data) && typeof data.id === 'string') return data.id
    } catch (err) {
      logger.debug(`Cannot read version.json from ${jar}: ${errorMessage(err)}`)
    }
  }
  return null
}

function newest(matches: (RegExpExecArray | null)[]) {
  const found = matches.filter((m): m is RegExpExecArray => m !== null)
  found.sort((a, b) => utils.compareVersions(a[1], b[1]) || utils.compareVersions(a[2], b[2]))
  return found.pop() ?? null
}

async function listJars(dir: string) {
  return (await listDir(dir)).filter((name) => name.toLowerCase().endsWith('.jar'))
}

async function listDir(dir: string): Promise<string[]> {
  try {
    return await fs.readdir(dir)
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return []
    logger.debug(`Cannot list ${dir}: ${errorMessage(err)}`)
    return []
  }
}

async function readText(file: string) {
  try {
    return await fs.readFile(file, 'utf-8')
  } catch {
    return ''
  }
}

async function isFile(file: string) {
  try {
    return (await fs.stat(file)).isFile()
  } catch {
    return false
  }
}
