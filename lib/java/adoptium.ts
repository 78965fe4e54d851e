/**
 * @license MIT
 * @copyright Copyright (c) 2026, GoldFrite
 */

import fs from 'node:fs/promises'
import path_ from 'node:path'
import * as tar from 'tar'
import EventEmitter from '../utils/events'
import type { JavaEvents } from '../../types/events'
import type { HttpClient } from '../../types/http'
import type { JavaProvider } from '../../types/java'
import { MSMError, ErrorType, errorMessage } from '../../types/errors'
import type Downloader from '../utils/downloader'
import pathsafety from '../utils/pathsafety'
import utils from '../utils/utils'
import { KeyedMutex } from '../utils/mutex'
import { getLogger, type Logger } from '../utils/logger'
import type Java from './java'

export const ADOPTIUM_API = 'https://api.adoptium.net/v3'

export interface AdoptiumOptions {
  http: HttpClient
  downloader: Downloader
  /** Used to locate and check the installed runtimes. */
  java: Java
  /** Folder of the runtimes. Java X is installed in `<runtimeDir>/jre-X`. */
  runtimeDir: string
  /** [Optional: default is `'jre'`] */
  imageType?: 'jre' | 'jdk'
  /** [Optional: default is the current platform] Adoptium OS name (`windows`, `mac`, `linux`). */
  os?: string
  /** [Optional: default is the current architecture] Adoptium architecture name (`x64`, `aarch64`). */
  arch?: string
  logger?: Logger
}

interface AdoptiumPackage {
  link: string
  name: string
  checksum: string
  size: number
}

/**
 * URL of the latest Temurin build of a Java major version.
 */
export function adoptiumAssetsUrl(major: number, os: string, arch: string, imageType: 'jre' | 'jdk') {
  return `${ADOPTIUM_API}/assets/latest/${major}/hotspot?architecture=${arch}&image_type=${imageType}&os=${os}&vendor=eclipse`
}

/**
 * Provide Java runtimes by downloading Eclipse Temurin builds from Adoptium.
 *
 * The archive is checked against the SHA256 published by Adoptium, then extracted in
 * `<runtimeDir>/jre-X`, where `Java.discover()` finds it afterwards.
 */
export default class AdoptiumProvider extends EventEmitter<JavaEvents> implements JavaProvider {
  private readonly http: HttpClient
  private readonly downloader: Downloader
  private readonly java: Java
  private readonly runtimeDir: string
  private readonly imageType: 'jre' | 'jdk'
  private readonly os: string
  private readonly arch: string
  private readonly logger: Logger
  private readonly locks = new KeyedMutex()

  constructor(options: AdoptiumOptions) {
    super()
    this.http = options.http
    this.downloader = options.downloader
    this.java = options.java
    this.runtimeDir = options.runtimeDir
    this.imageType = options.imageType ?? 'jre'
    this.os = options.os ?? (process.platform === 'win32' ? 'windows' : process.platform === 'darwin' ? 'mac' : 'linux')
    this.arch = options.arch ?? (process.arch === 'arm64' ? 'aarch64' : 'x64')
    this.logger = options.logger ?? getLogger('Adoptium')
  }

  /**
   * Java executable of a major version, installed first if it is missing or broken.
   * @throws `JAVA_ERROR` if Adoptium has no build for this platform, `HASH_ERROR` if the archive
   * does not match its checksum.
   */
  async ensure(major: number, options: { signal?: AbortSignal } = {}): Promise<string> {
    return await this.locks.run(String(major), async () => {
      const root = this.runtimeRoot(major)
      const installed = await this.installed(root)
      if (installed) return installed
      return await this.install(major, root, options.signal)
    })
  }

  runtimeRoot(major: number) {
    return path_.join(this.runtimeDir, `jre-${major}`)
  }

  private async installed(root: string): Promise<string | null> {
    const execPath = this.java.javaExecFromRoot(root)
    if (!(await pathsafety.exists(execPath))) return null
    try {
      await this.java.check(execPath)
      return execPath
    } catch (err) {
      this.logger.warn(`Runtime in ${root} is broken, installing it again: ${errorMessage(err)}`)
      return null
    }
  }

  private async install(major: number, root: string, signal?: AbortSignal): Promise<string> {
    const pkg = await this.fetchPackage(major, signal)
    this.logger.info(`Downloading ${pkg.name}`)
    await fs.mkdir(this.runtimeDir, { recursive: true })

    const archive = path_.join(this.runtimeDir, pkg.name)
    const staging = `${root}.tmp`
    try {
      await this.downloader.download(pkg.link, archive, {
        signal,
        type: 'JAVA',
        onProgress: (progress) => {
          const totalSize = progress.total.size || pkg.size
          this.emit('java_download_progress', {
            major,
            percent: totalSize > 0 ? Math.round((progress.downloaded.size / totalSize) * 100) : 0,
            downloadedSize: progress.downloaded.size,
            totalSize,
            speed: progress.speed
          })
        }
      })

      const sha256 = await pathsafety.digest(archive, 'sha256')
      if (sha256 !== pkg.checksum.toLowerCase()) {
        throw new MSMError(ErrorType.HASH_ERROR, `Invalid SHA256 for ${pkg.name}: expected ${pkg.checksum}, got ${sha256}`, { path: archive })
      }

      await fs.rm(staging, { recursive: true, force: true })
      await this.extract(archive, staging)
      const home = await singleChild(staging)
      await fs.rm(root, { recursive: true, force: true })
      await fs.rename(home, root)
    } finally {
      await fs.rm(archive, { force: true })
      await fs.rm(staging, { recursive: true, force: true })
    }

    const execPath = this.java.javaExecFromRoot(root)
    if (process.platform !== 'win32') await fs.chmod(execPath, 0o755)
    const details = await this.java.check(execPath)
    if (details.semver.major !== major) {
      throw new MSMError(ErrorType.JAVA_ERROR, `Expected Java ${major} in ${pkg.name}, found Java ${details.semverStr}`, { path: root })
    }

    this.logger.info(`Installed Java ${details.semverStr} in ${root}`)
    this.emit('java_installed', { major, path: execPath })
    return execPath
  }

  private async fetchPackage(major: number, signal?: AbortSignal): Promise<AdoptiumPackage> {
    const data = await this.http.getJson(adoptiumAssetsUrl(major, this.os, this.arch, this.imageType), { signal })
    const assets: unknown[] = Array.isArray(data) ? data : []

    for (const asset of assets) {
      const binary = utils.isRecord(asset) ? asset.binary : null
      if (!utils.isRecord(binary)) continue
      if (binary.os !== this.os || binary.architecture !== this.arch || binary.image_type !== this.imageType) continue

      const pkg = binary.package
      if (utils.isRecord(pkg) && typeof pkg.link === 'string' && typeof pkg.name === 'string' && typeof pkg.checksum === 'string') {
        return { link: pkg.link, name: path_.basename(pkg.name), checksum: pkg.checksum, size: typeof pkg.size === 'number' ? pkg.size : 0 }
      }
    }

    throw new MSMError(ErrorType.JAVA_ERROR, `Adoptium has no Java ${major} ${this.imageType} for ${this.os} ${this.arch}`)
  }

  private async extract(archive: string, dest: string) {
    if (archive.endsWith('.zip')) {
      await pathsafety.extractArchiveSafely(archive, dest)
    } else if (archive.endsWith('.tar.gz') || archive.endsWith('.tgz')) {
      await fs.mkdir(dest, { recursive: true })
      await tar.x({ file: archive, cwd: dest })
    } else {
      throw new MSMError(ErrorType.JAVA_ERROR, `Unsupported archive ${path_.basename(archive)}`)
    }
  }
}

/**
 * The folder the archive was packed from: its only top-level folder, or `dir` itself.
 */
async function singleChild(dir: string) {
  const entries = await fs.readdir(dir, { withFileTypes: true })
  const only = entries.length === 1 ? entries[0] : null
  return only && only.isDirectory() ? path_.join(dir, only.name) : dir
}
