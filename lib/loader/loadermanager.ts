/**
 * @license MIT
 * @copyright Copyright (c) 2026, GoldFrite
 */

import fs from 'node:fs/promises'
import path_ from 'node:path'
import EventEmitter from '../utils/events'
import type { LoaderEvents } from '../../types/events'
import type { ExecuteOptions, InstallPlan, InstallResult, InstallStage } from '../../types/loader'
import type { JavaProvider } from '../../types/java'
import type { LoaderVersionEntry } from '../../types/version'
import type { ServerRecord } from '../../types/server'
import { MSMError, ErrorType, errorMessage } from '../../types/errors'
import type VersionCatalog from '../catalog/versioncatalog'
import type Java from '../java/java'
import type ProcessRunner from '../process/processrunner'
import type Downloader from '../utils/downloader'
import type { DownloadProgress } from '../utils/downloader'
import pathsafety from '../utils/pathsafety'
import utils from '../utils/utils'
import { getLogger, type Logger } from '../utils/logger'
import { FABRIC_INSTALLER, isFabricCompatible } from '../catalog/loaders/fabric'
import { forgeInstallerUrl } from '../catalog/loaders/forge'
import { FABRIC_JARS, FORGE_LIBRARIES, findLaunchScript } from '../server/detection'

export interface LoaderManagerOptions {
  catalog: VersionCatalog
  java: Java
  runner: ProcessRunner
  downloader: Downloader
  /** [Optional] Provides a Java runtime when none is installed. */
  javaProvider?: JavaProvider
  logger?: Logger
}

const PROGRESS: Record<InstallStage, number> = {
  PENDING: 0,
  RESOLVING_JAVA: 5,
  DOWNLOADING: 10,
  INSTALLING: 60,
  VERIFYING: 90,
  COMPLETE: 100,
  FAILED: 100
}

/**
 * Resolve and install the server software (vanilla jar, Fabric or Forge) of a server.
 */
export default class LoaderManager extends EventEmitter<LoaderEvents> {
  private readonly catalog: VersionCatalog
  private readonly java: Java
  private readonly runner: ProcessRunner
  private readonly downloader: Downloader
  private readonly javaProvider: JavaProvider | null
  private readonly logger: Logger

  constructor(options: LoaderManagerOptions) {
    super()
    this.catalog = options.catalog
    this.java = options.java
    this.runner = options.runner
    this.downloader = options.downloader
    this.javaProvider = options.javaProvider ?? null
    this.logger = options.logger ?? getLogger('LoaderManager')
  }

  /**
   * Build the installation plan of a server.
   * @param requestedLoaderVersion [Optional] Loader version to install. Default is the version of
   * the record, or the latest stable version.
   * @throws `NOT_FOUND` if the Minecraft or loader version does not exist, `CONFIG_ERROR` if the
   * loader does not support the Minecraft version.
   */
  async resolveInstall(record: ServerRecord, requestedLoaderVersion: string | null = null, options: ExecuteOptions = {}): Promise<InstallPlan> {
    const gameVersion = record.gameVersion
    const targetDir = path_.resolve(record.path)

    if (record.loaderKind === 'vanilla') {
      const version = await this.catalog.findVanilla(gameVersion)
      if (!version) throw new MSMError(ErrorType.NOT_FOUND, `Minecraft ${gameVersion} not found, or publishes no server`)
      return {
        record,
        kind: 'vanilla',
        gameVersion,
        loaderVersion: null,
        javaMajor: version.javaMajor,
        javaPath: record.javaPath,
        installerUrl: null,
        serverJarUrl: version.serverUrl,
        serverJarSha1: version.serverSha1,
        targetDir,
        expectedArtifacts: ['server.jar'],
        expectedLaunchScripts: []
      }
    }

    const kind = record.loaderKind
    if (kind === 'fabric' && !isFabricCompatible(gameVersion)) {
      throw new MSMError(ErrorType.CONFIG_ERROR, `Fabric requires Minecraft 1.14 or newer (got ${gameVersion})`)
    }

    const entry = await this.resolveLoaderVersion(kind, gameVersion, requestedLoaderVersion ?? record.loaderVersion, options.signal)
    const javaMajor = await this.catalog.getRequiredJavaMajor(gameVersion)
    const id = `${gameVersion}-${entry.version}`

    return {
      record,
      kind,
      gameVersion,
      loaderVersion: entry.version,
      javaMajor,
      javaPath: record.javaPath,
      installerUrl: entry.url,
      serverJarUrl: null,
      serverJarSha1: null,
      targetDir,
      expectedArtifacts:
        kind === 'fabric'
          ? FABRIC_JARS
          : [`forge-${id}.jar`, `forge-${id}-universal.jar`, `forge-${id}-shim.jar`, path_.join(FORGE_LIBRARIES, id)],
      // Forge installers write run.sh and run.bat since 1.17
      expectedLaunchScripts: kind === 'forge' && utils.isGameVersionAtLeast(gameVersion, [1, 17]) ? ['run.sh', 'run.bat'] : []
    }
  }

  /**
   * Run an installation plan.
   *
   * Cancellation before the installer runs stops immediately and removes the downloaded files. Once
   * the installer runs, cancellation waits for it to exit, and is reported as `CANCELLED` after
   * verification.
   * @returns `COMPLETE`, or `FAILED` with the stage at which it failed. Never throws.
   */
  async execute(plan: InstallPlan, options: ExecuteOptions = {}): Promise<InstallResult> {
    const signal = options.signal
    const serverId = plan.record.id
    const downloaded: string[] = []
    let stage: InstallStage = 'PENDING'
    let exitCode: number | null | undefined
    let cancelled = false

    const enter = (next: InstallStage, message: string) => {
      this.emit('install_stage', { serverId, stage: next, previous: stage })
      this.emit('install_progress', { serverId, stage: next, percent: PROGRESS[next], message })
      this.emit('install_debug', `[${serverId}] ${stage} -> ${next}`)
      stage = next
    }
    const checkCancelled = () => {
      if (signal?.aborted) throw new MSMError(ErrorType.CANCELLED, 'Installation cancelled', { stage, serverId })
    }

    try {
      checkCancelled()
      enter('RESOLVING_JAVA', `Resolving Java ${plan.javaMajor}`)
      const javaPath = await this.resolveJava(plan, signal)

      checkCancelled()
      enter('DOWNLOADING', plan.kind === 'vanilla' ? `Downloading Minecraft ${plan.gameVersion}` : `Downloading the ${plan.kind} installer`)
      await fs.mkdir(plan.targetDir, { recursive: true })
      const file = await this.download(plan, serverId, downloaded, signal)

      if (plan.kind !== 'vanilla') {
        checkCancelled()
        enter('INSTALLING', `Installing ${plan.kind} ${plan.loaderVersion}`)
        const run = await this.runInstaller(plan, javaPath, file, serverId, signal)
        exitCode = run.exitCode
        cancelled = run.cancelled
      }

      enter('VERIFYING', 'Verifying the installation')
      const artifact = await this.verify(plan)
      if (exitCode !== undefined && exitCode !== 0 && !cancelled) {
        throw new MSMError(ErrorType.INSTALL_ERROR, `The ${plan.kind} installer exited with code ${exitCode}`, { exitCode, stage: 'INSTALLING' })
      }
      if (!artifact && !cancelled) {
        throw new MSMError(ErrorType.INSTALL_ERROR, `Installation incomplete: ${missing(plan)}`, {
          exitCode,
          stage: 'VERIFYING'
        })
      }
      if (plan.kind !== 'vanilla') await this.removeLeftovers(plan, file)
      if (cancelled || !artifact) throw new MSMError(ErrorType.CANCELLED, 'Installation cancelled', { stage: 'INSTALLING', serverId })

      enter('COMPLETE', 'Installation complete')
      this.logger.info(`Installed ${plan.kind} ${plan.loaderVersion ?? plan.gameVersion} in ${plan.targetDir}`)
      return { status: 'COMPLETE', plan, javaPath, artifact, launchScript: await findLaunchScript(plan.targetDir) }
    } catch (err) {
      const error = err instanceof MSMError ? err : new MSMError(ErrorType.INSTALL_ERROR, errorMessage(err), { stage })
      const failedAt = isStage(error.details.stage) ? error.details.stage : stage

      if (stage === 'RESOLVING_JAVA' || stage === 'DOWNLOADING') {
        for (const file of downloaded) await fs.rm(file, { force: true })
      }

      this.logger.error(`Installation of ${plan.kind} for ${serverId} failed at ${failedAt}: ${error.message}`)
      enter('FAILED', error.message)
      return { status: 'FAILED', plan, stage: failedAt, code: error.code, message: error.message, exitCode: error.details.exitCode ?? exitCode }
    }
  }

  /**
   * Java executable for a plan: the configured one if it works, else an installed Java of the
   * required major version (or newer), else one from the Java provider.
   * @throws `JAVA_ERROR` if no Java is available.
   */
  async resolveJava(plan: InstallPlan, signal?: AbortSignal): Promise<string> {
    if (plan.javaPath) {
      await this.java.check(plan.javaPath)
      return plan.javaPath
    }

    const best = await this.java.findBest(plan.javaMajor)
    if (best) {
      this.logger.debug(`Using Java ${best.semverStr} at ${best.execPath}`)
      return best.execPath
    }

    if (this.javaProvider) {
      this.logger.info(`No Java ${plan.javaMajor} found, requesting it from the provider`)
      try {
        return await this.javaProvider.ensure(plan.javaMajor, { signal })
      } catch (err) {
        if (err instanceof MSMError) throw err
        throw new MSMError(ErrorType.JAVA_ERROR, `Cannot provide Java ${plan.javaMajor}: ${errorMessage(err)}`)
      }
    }

    throw new MSMError(ErrorType.JAVA_ERROR, `Java ${plan.javaMajor} or newer is required and was not found`)
  }

  private async resolveLoaderVersion(
    kind: 'fabric' | 'forge',
    gameVersion: string,
    requested: string | null,
    signal?: AbortSignal
  ): Promise<Pick<LoaderVersionEntry, 'version' | 'url'>> {
    const result = await this.catalog.fetchLoaderVersions(kind, { gameVersion, includePrerelease: requested !== null, signal })

    if (requested) {
      const entry = result.entries.find((e) => e.version === requested)
      if (entry) return entry
      if (result.source !== 'offline') throw new MSMError(ErrorType.NOT_FOUND, `${kind} ${requested} not found for Minecraft ${gameVersion}`)
      this.logger.warn(`Version catalog offline, installing ${kind} ${requested} without checking it`)
      return { version: requested, url: kind === 'forge' ? forgeInstallerUrl(gameVersion, requested) : FABRIC_INSTALLER }
    }

    const latest = result.entries[0]
    if (!latest) {
      const reason = result.source === 'offline' ? ' (version catalog offline)' : ''
      throw new MSMError(ErrorType.NOT_FOUND, `No ${kind} version available for Minecraft ${gameVersion}${reason}`)
    }
    return latest
  }

  private async download(plan: InstallPlan, serverId: string, downloaded: string[], signal?: AbortSignal) {
    const url = plan.serverJarUrl ?? plan.installerUrl
    if (!url) throw new MSMError(ErrorType.CONFIG_ERROR, `Nothing to download for ${plan.kind} ${plan.gameVersion}`)
    const dest = plan.serverJarUrl ? path_.join(plan.targetDir, 'server.jar') : path_.join(plan.targetDir, path_.basename(new URL(url).pathname))

    const onProgress = (progress: DownloadProgress) => {
      if (progress.total.size <= 0) return
      const ratio = Math.min(1, progress.downloaded.size / progress.total.size)
      const percent = PROGRESS.DOWNLOADING + Math.floor(ratio * (PROGRESS.INSTALLING - PROGRESS.DOWNLOADING))
      this.emit('install_progress', { serverId, stage: 'DOWNLOADING', percent, message: path_.basename(dest) })
    }

    downloaded.push(dest)
    return await this.downloader.download(url, dest, {
      signal,
      sha1: plan.serverJarSha1,
      type: plan.kind === 'vanilla' ? 'SERVER' : 'INSTALLER',
      onProgress
    })
  }

  private installerArgs(plan: InstallPlan, installer: string) {
    if (plan.kind === 'fabric') {
      const loader = plan.loaderVersion ?? ''
      return ['-jar', installer, 'server', '-mcversion', plan.gameVersion, '-loader', loader, '-dir', plan.targetDir, '-downloadMinecraft']
    }
    return ['-jar', installer, '--installServer', plan.targetDir]
  }

  private async runInstaller(plan: InstallPlan, javaPath: string, installer: string, serverId: string, signal?: AbortSignal) {
    const handle = await this.runner.start(javaPath, this.installerArgs(plan, installer), { cwd: plan.targetDir, stdin: 'ignore' })
    handle.on('process_line', ({ line }) => this.emit('install_output', { serverId, line }))

    let cancelled = false
    const onAbort = () => {
      cancelled = true
      this.logger.info(`Cancellation of ${serverId} requested, waiting for the installer to exit`)
    }
    if (signal?.aborted) onAbort()
    else signal?.addEventListener('abort', onAbort, { once: true })

    try {
      const exitCode = await handle.wait()
      if (exitCode !== 0) this.logger.error(`Installer output:\n${handle.lastLines().join('\n')}`)
      return { exitCode, cancelled }
    } finally {
      signal?.removeEventListener('abort', onAbort)
    }
  }

  /**
   * @returns The first expected artifact found, `null` if none is, or if the plan expects a launch
   * script and none is there.
   */
  private async verify(plan: InstallPlan): Promise<string | null> {
    const artifact = await this.firstExisting(plan.targetDir, plan.expectedArtifacts)
    if (!artifact || plan.expectedLaunchScripts.length === 0) return artifact
    return (await this.firstExisting(plan.targetDir, plan.expectedLaunchScripts)) ? artifact : null
  }

  private async firstExisting(dir: string, names: string[]) {
    for (const name of names) {
      if (await pathsafety.exists(path_.join(dir, name))) return name
    }
    return null
  }

  private async removeLeftovers(plan: InstallPlan, installer: string) {
    for (const file of [installer, path_.join(plan.targetDir, 'installer.log'), `${installer}.log`]) {
      try {
        await fs.rm(file, { force: true })
      } catch (err) {
        this.logger.warn(`Cannot remove ${file}: ${errorMessage(err)}`)
      }
    }
  }
}

function missing(plan: InstallPlan) {
  const artifacts = `one of ${plan.expectedArtifacts.join(', ')}`
  if (plan.expectedLaunchScripts.length === 0) return `${artifacts} was expected`
  return `${artifacts} and one of ${plan.expectedLaunchScripts.join(', ')} were expected`
}

function isStage(value: unknown): value is InstallStage {
  return typeof value === 'string' && value in PROGRESS
}
