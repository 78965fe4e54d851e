/**
 * @license MIT
 * @copyright Copyright (c) 2026, GoldFrite
 */

import type { JavaEvents } from '../../types/events'
import type { JvmDetails } from '../../types/java'
import EventEmitter from '../utils/events'
import path_ from 'node:path'
import fs from 'node:fs/promises'
import fsSync from 'node:fs'
import { execFile } from 'node:child_process'
import { promisify } from 'node:util'
import { MSMError, ErrorType, errorMessage } from '../../types/errors'
import { getLogger, type Logger } from '../utils/logger'

const execFileAsync = promisify(execFile)

/**
 * Java version requirements of Minecraft versions, used when the version metadata is not available.
 * - Java 8: before 1.17
 * - Java 16: 1.17
 * - Java 17: 1.18 to 1.20.4
 * - Java 21: 1.20.5 to 1.21.x
 * - Java 25: 26.1 onwards
 */
const JAVA_VERSION_MAP: { pattern: RegExp; java: number }[] = [
  { pattern: /^(2[6-9]|[3-9]\d)\./, java: 25 },
  { pattern: /^26w\d{2}[a-z]/, java: 25 },
  { pattern: /^1\.2[1-9]/, java: 21 },
  { pattern: /^1\.20\.([5-9]|1\d)/, java: 21 },
  { pattern: /^25w\d{2}[a-z]/, java: 21 },
  { pattern: /^24w(1[4-9]|[2-5]\d)[a-z]/, java: 21 },
  { pattern: /^1\.(19|20)/, java: 17 },
  { pattern: /^1\.18(?!-pre1$)/, java: 17 },
  { pattern: /^24w(0[1-9]|1[0-3])[a-z]/, java: 17 },
  { pattern: /^2[23]w\d{2}[a-z]/, java: 17 },
  { pattern: /^1\.1[78]/, java: 16 },
  { pattern: /^21w(19|[2-9]\d)[a-z]/, java: 16 },
  { pattern: /.*/, java: 8 }
]

export interface JavaOptions {
  /** [Optional] Folder where Java runtimes are installed (`jre-X` folders). */
  runtimeDir?: string
  /** [Optional] Additional Java root folders to check. */
  extraPaths?: string[]
  /** [Optional: default is `true`] Search the system (environment variables, common folders, `PATH`). */
  searchSystem?: boolean
  logger?: Logger
}

/**
 * Discover Java installations and select one for a Minecraft version.
 */
export default class Java extends EventEmitter<JavaEvents> {
  private readonly runtimeDir: string | null
  private readonly extraPaths: string[]
  private readonly searchSystem: boolean
  private readonly logger: Logger

  constructor(options: JavaOptions = {}) {
    super()
    this.runtimeDir = options.runtimeDir ?? null
    this.extraPaths = options.extraPaths ?? []
    this.searchSystem = options.searchSystem ?? true
    this.logger = options.logger ?? getLogger('Java')
  }

  /**
   * Get the required Java major version for a Minecraft version, from the static map.
   * @param minecraftVersion The Minecraft version to check.
   */
  static getRequiredJavaVersion(minecraftVersion: string): number {
    for (const { pattern, java } of JAVA_VERSION_MAP) {
      if (pattern.test(minecraftVersion)) return java
    }
    return 8
  }

  /**
   * Discover existing Java installations on the system.
   * @returns Array of discovered JVM details, sorted by version (newest first).
   */
  async discover(): Promise<JvmDetails[]> {
    const roots = await this.getJavaCandidatePaths()
    const results: JvmDetails[] = []
    const seen = new Set<string>()

    for (const root of roots) {
      const execPath = this.javaExecFromRoot(root)
      if (seen.has(execPath) || !fsSync.existsSync(execPath)) continue
      seen.add(execPath)

      const details = await this.getJvmDetails(execPath, root)
      if (details) results.push(details)
    }

    results.sort((a, b) => {
      if (a.semver.major !== b.semver.major) return b.semver.major - a.semver.major
      if (a.semver.minor !== b.semver.minor) return b.semver.minor - a.semver.minor
      return b.semver.patch - a.semver.patch
    })

    const best = results.length > 0 ? { version: results[0].semverStr, path: results[0].execPath } : null
    this.emit('java_discovered', { count: results.length, best })
    this.logger.debug(`Discovered ${results.length} Java installation(s)`)

    return results
  }

  /**
   * Find the best Java installation for a required major version: the exact major version, or else
   * the newest installation above it.
   * @returns The best matching JVM or `null` if none found.
   */
  async findBest(requiredMajor: number): Promise<JvmDetails | null> {
    const discovered = await this.discover()
    return discovered.find((jvm) => jvm.semver.major === requiredMajor) ?? discovered.find((jvm) => jvm.semver.major >= requiredMajor) ?? null
  }

  /**
   * Check that a Java executable works.
   * @param execPath Path to the Java executable.
   * @throws `JAVA_ERROR` if Java cannot be run.
   */
  async check(execPath: string): Promise<JvmDetails> {
    const details = await this.getJvmDetails(execPath, this.ensureJavaRoot(execPath))
    if (!details) throw new MSMError(ErrorType.JAVA_ERROR, `Java is not correctly installed at ${execPath}`)
    this.emit('java_info', { version: details.semverStr, arch: details.arch })
    return details
  }

  private async getJavaCandidatePaths(): Promise<string[]> {
    const paths = new Set<string>(this.extraPaths)

    if (this.runtimeDir) await this.addChildren(paths, this.runtimeDir, (entry) => entry.startsWith('jre-') || entry.startsWith('jdk'))
    if (!this.searchSystem) return [...paths]

    for (const envVar of ['JAVA_HOME', 'JRE_HOME', 'JDK_HOME']) {
      const value = process.env[envVar]
      if (value) paths.add(this.ensureJavaRoot(value))
    }

    for (const dir of (process.env['PATH'] ?? '').split(path_.delimiter)) {
      if (dir && fsSync.existsSync(path_.join(dir, process.platform === 'win32' ? 'java.exe' : 'java'))) {
        paths.add(path_.basename(dir) === 'bin' ? path_.dirname(dir) : dir)
      }
    }

    switch (process.platform) {
      case 'win32': {
        const programFiles = process.env['ProgramFiles'] ?? 'C:\\Program Files'
        const vendors = ['Java', 'Eclipse Adoptium', 'Eclipse Foundation', 'AdoptOpenJDK', 'Amazon Corretto', 'Microsoft', 'Zulu']
        for (const vendor of vendors) await this.addChildren(paths, path_.join(programFiles, vendor))
        break
      }
      case 'darwin':
        await this.addChildren(paths, '/Library/Java/JavaVirtualMachines')
        break
      default:
        for (const dir of ['/usr/lib/jvm', '/usr/java', '/opt/java']) await this.addChildren(paths, dir)
    }

    return [...paths]
  }

  private async addChildren(paths: Set<string>, dir: string, filter: (entry: string) => boolean = () => true) {
    let entries: string[]
    try {
      entries = await fs.readdir(dir)
    } catch {
      return
    }
    for (const entry of entries) {
      if (filter(entry)) paths.add(path_.join(dir, entry))
    }
  }

  /**
   * Run `java -version` and parse its output.
   */
  private async getJvmDetails(execPath: string, javaRoot: string): Promise<JvmDetails | null> {
    let output: string
    try {
      const { stdout, stderr } = await execFileAsync(execPath, ['-version'], { timeout: 10000, windowsHide: true })
      output = stderr + stdout
    } catch (err) {
      this.logger.debug(`Cannot run ${execPath}: ${errorMessage(err)}`)
      return null
    }

    const parsed = parseJavaVersion(output)
    if (!parsed) return null
    return { ...parsed, path: javaRoot, execPath }
  }

  /**
   * Get the Java executable path from a Java root directory.
   */
  javaExecFromRoot(root: string): string {
    switch (process.platform) {
      case 'win32':
        return path_.join(root, 'bin', 'java.exe')
      case 'darwin': {
        const macHome = path_.join(root, 'Contents', 'Home', 'bin', 'java')
        return fsSync.existsSync(macHome) ? macHome : path_.join(root, 'bin', 'java')
      }
      default:
        return path_.join(root, 'bin', 'java')
    }
  }

  /**
   * Ensure a path points to the Java root directory.
   */
  private ensureJavaRoot(dir: string): string {
    if (process.platform === 'darwin') {
      const idx = dir.indexOf('/Contents/Home')
      if (idx > -1) return dir.substring(0, idx)
    }

    const binIdx = dir.indexOf(path_.join(path_.sep, 'bin', 'java'))
    if (binIdx > -1) return dir.substring(0, binIdx)

    return dir
  }
}

/**
 * Parse the output of `java -version`. Java 8 reports `1.8.0_xxx`, Java 9+ reports `17.0.5`.
 */
export function parseJavaVersion(output: string): Omit<JvmDetails, 'path' | 'execPath'> | null {
  const versionMatch = output.match(/version "(\d+)(?:\.(\d+))?(?:\.(\d+))?[^"]*"/)
  if (!versionMatch) return null

  const first = parseInt(versionMatch[1])
  const legacy = first === 1
  const major = legacy ? parseInt(versionMatch[2] ?? '0') : first
  const minor = legacy ? 0 : parseInt(versionMatch[2] ?? '0')
  const updateMatch = output.match(/_(\d+)/)
  const patch = legacy ? (updateMatch ? parseInt(updateMatch[1]) : 0) : parseInt(versionMatch[3] ?? '0')

  const vendorMatch = output.match(/(?:OpenJDK|Java\(TM\)|Amazon|Eclipse|Azul|Microsoft|GraalVM)[^\n]*/i)

  return {
    semver: { major, minor, patch },
    semverStr: `${major}.${minor}.${patch}`,
    vendor: vendorMatch ? vendorMatch[0].trim() : 'Unknown',
    arch: output.includes('64-Bit') ? '64-bit' : '32-bit'
  }
}
