/**
 * @license MIT
 * @copyright Copyright (c) 2026, GoldFrite
 */

import fsSync from 'node:fs'
import fs from 'node:fs/promises'
import path_ from 'node:path'
import type { AssetMode, DeploymentMode, InstallerLauncher, Release, ReleaseAsset, ReleaseFile, UpdateSwapper, UpdateTransaction } from '../../types/update'
import { MSMError, ErrorType, errorMessage } from '../../types/errors'
import pathsafety from '../utils/pathsafety'
import releases from '../update/releases'
import utils from '../utils/utils'
import { getLogger, type Logger } from '../utils/logger'

const PENDING_MARKER = '.update-pending'
const APP_FOLDER = 'MinecraftServerManager'

export interface DeploymentCollaborators {
  swapper?: UpdateSwapper
  installerLauncher?: InstallerLauncher
  logger?: Logger
}

/**
 * Where the application lives, and how it is updated.
 */
export interface DeploymentLayout {
  readonly mode: DeploymentMode
  /** Folder of the application (where the executable is). */
  readonly installDir: string
  /** Application data (logs, cache, settings). */
  readonly dataDir: string
  readonly cacheDir: string
  /**
   * Select the update asset of a release for this layout.
   * @returns `null` if the release has no suitable asset.
   */
  selectAsset(release: Release, allowFallback: boolean): { file: ReleaseFile; mode: AssetMode } | null
  /**
   * Install a downloaded and verified asset.
   */
  apply(assetPath: string, asset: ReleaseAsset): Promise<UpdateTransaction>
  /**
   * Restore the installation if a previous update was interrupted.
   * @returns `true` if a backup was restored.
   */
  recover(): Promise<boolean>
}

abstract class BaseDeployment implements DeploymentLayout {
  abstract readonly mode: DeploymentMode
  readonly installDir: string
  readonly dataDir: string
  readonly cacheDir: string
  protected readonly collaborators: DeploymentCollaborators
  protected readonly logger: Logger

  constructor(installDir: string, dataDir: string, collaborators: DeploymentCollaborators) {
    this.installDir = path_.resolve(installDir)
    this.dataDir = path_.resolve(dataDir)
    this.cacheDir = path_.join(this.dataDir, 'Cache')
    this.collaborators = collaborators
    this.logger = collaborators.logger ?? getLogger('Deployment')
  }

  abstract selectAsset(release: Release, allowFallback: boolean): { file: ReleaseFile; mode: AssetMode } | null
  abstract apply(assetPath: string, asset: ReleaseAsset): Promise<UpdateTransaction>
  abstract recover(): Promise<boolean>

  /**
   * Launch the installer. If it is missing or cannot be launched, the update is aborted before
   * anything else is done.
   */
  protected async launchInstaller(assetPath: string, asset: ReleaseAsset): Promise<UpdateTransaction> {
    const launcher = this.collaborators.installerLauncher
    if (!launcher) throw new MSMError(ErrorType.CONFIG_ERROR, 'No installer launcher configured')
    if (!(await pathsafety.exists(assetPath))) {
      const error = new MSMError(ErrorType.INSTALL_ERROR, `Update aborted: installer ${asset.name} not found`, { path: assetPath })
      this.logger.error(error.message)
      throw error
    }

    try {
      await launcher.launch(assetPath)
    } catch (err) {
      const error = new MSMError(ErrorType.INSTALL_ERROR, `Update aborted: cannot launch installer ${asset.name}: ${errorMessage(err)}`, {
        path: assetPath
      })
      this.logger.error(error.message)
      throw error
    }

    this.logger.info(`Installer ${asset.name} (${asset.version}) launched`)
    return { stagingDir: path_.dirname(assetPath), backupDir: null, assetPath, verified: true, mode: this.mode }
  }
}

/**
 * Installed mode: application data lives in a fixed per-user folder, and the platform installer
 * replaces the application.
 */
export class InstalledDeployment extends BaseDeployment {
  readonly mode = 'installed'

  constructor(installDir: string, dataDir?: string, collaborators: DeploymentCollaborators = {}) {
    super(installDir, dataDir ?? installedDataDir(), collaborators)
  }

  selectAsset(release: Release) {
    const file = releases.chooseInstallerAsset(release)
    return file ? { file, mode: 'installer' as const } : null
  }

  apply(assetPath: string, asset: ReleaseAsset) {
    return this.launchInstaller(assetPath, asset)
  }

  async recover() {
    return false
  }
}

/**
 * Portable mode: everything lives next to the executable. The new version is extracted to a staging
 * folder and the current tree is backed up, then an external step closes the application and swaps
 * them. A marker is left in the installation until the swap completes: if it is still there at the
 * next launch, the backup is restored.
 */
export class PortableDeployment extends BaseDeployment {
  readonly mode = 'portable'
  readonly stagingDir: string
  readonly backupDir: string

  constructor(installDir: string, dataDir?: string, collaborators: DeploymentCollaborators = {}) {
    super(installDir, dataDir ?? path_.join(installDir, '.config'), collaborators)
    this.stagingDir = `${this.installDir}.staging`
    this.backupDir = `${this.installDir}.backup`
  }

  get markerFile() {
    return path_.join(this.installDir, PENDING_MARKER)
  }

  selectAsset(release: Release, allowFallback: boolean) {
    const portable = releases.choosePortableAsset(release)
    if (portable) return { file: portable, mode: 'portable' as const }
    if (!allowFallback) return null
    const installer = releases.chooseInstallerAsset(release)
    return installer ? { file: installer, mode: 'installer_fallback' as const } : null
  }

  async apply(assetPath: string, asset: ReleaseAsset): Promise<UpdateTransaction> {
    if (asset.mode === 'installer_fallback') return await this.launchInstaller(assetPath, asset)

    const swapper = this.collaborators.swapper
    if (!swapper) throw new MSMError(ErrorType.CONFIG_ERROR, 'No update swapper configured')

    await pathsafety.removePath(this.stagingDir)
    try {
      await pathsafety.extractArchiveSafely(assetPath, this.stagingDir)
    } catch (err) {
      await pathsafety.removePath(this.stagingDir)
      this.logger.error(`Cannot stage ${asset.name}: ${errorMessage(err)}`)
      throw err
    }

    try {
      await pathsafety.removePath(this.backupDir)
      await pathsafety.copyDir(this.installDir, this.backupDir)
    } catch (err) {
      await pathsafety.removePath(this.stagingDir)
      await pathsafety.removePath(this.backupDir)
      this.logger.error(`Cannot back up ${this.installDir}: ${errorMessage(err)}`)
      throw err
    }

    const transaction: UpdateTransaction = {
      stagingDir: this.stagingDir,
      backupDir: this.backupDir,
      assetPath,
      verified: true,
      mode: 'portable'
    }
    await pathsafety.atomicWriteFile(this.markerFile, JSON.stringify({ version: asset.version, backupDir: this.backupDir, createdAt: Date.now() }))

    try {
      await swapper.handOff(transaction)
    } catch (err) {
      const error = new MSMError(ErrorType.INSTALL_ERROR, `Update aborted: cannot hand off the swap: ${errorMessage(err)}`)
      this.logger.error(error.message)
      await this.recover()
      throw error
    }

    this.logger.info(`Update ${asset.version} staged in ${this.stagingDir}, swap handed off`)
    return transaction
  }

  async recover() {
    if (!(await pathsafety.exists(this.markerFile))) return false

    if (!(await pathsafety.exists(this.backupDir))) {
      this.logger.warn(`Interrupted update detected but no backup found at ${this.backupDir}`)
      await fs.rm(this.markerFile, { force: true })
      return false
    }

    this.logger.warn(`Interrupted update detected, restoring ${this.backupDir}`)
    const keep = new Set(await fs.readdir(this.backupDir))
    for (const entry of await fs.readdir(this.installDir)) {
      if (!keep.has(entry)) await pathsafety.removePath(path_.join(this.installDir, entry))
    }
    await pathsafety.copyDir(this.backupDir, this.installDir)

    await fs.rm(this.markerFile, { force: true })
    await pathsafety.removePath(this.stagingDir)
    await pathsafety.removePath(this.backupDir)
    return true
  }
}

/**
 * `%LOCALAPPDATA%/Programs/MinecraftServerManager` on Windows, `<data home>/MinecraftServerManager` elsewhere.
 */
export function installedDataDir() {
  const base = utils.getLocalAppData()
  return process.platform === 'win32' ? path_.join(base, 'Programs', APP_FOLDER) : path_.join(base, APP_FOLDER)
}

/**
 * Whether the application at `appDir` runs in portable mode (`.portable` file or `.config` folder next to it).
 */
export function isPortable(appDir: string) {
  return fsSync.existsSync(path_.join(appDir, '.portable')) || fsSync.existsSync(path_.join(appDir, '.config'))
}

/**
 * Select the deployment layout, once, at startup.
 */
export function detectDeployment(appDir: string, dataDir?: string, collaborators: DeploymentCollaborators = {}): DeploymentLayout {
  return isPortable(appDir) ? new PortableDeployment(appDir, dataDir, collaborators) : new InstalledDeployment(appDir, dataDir, collaborators)
}
