/**
 * @license MIT
 * @copyright Copyright (c) 2026, GoldFrite
 */

import fs from 'node:fs/promises'
import os from 'node:os'
import path_ from 'node:path'
import EventEmitter from '../utils/events'
import type { UpdateEvents } from '../../types/events'
import type { HttpClient } from '../../types/http'
import type { Checksum, Release, ReleaseAsset, UpdateCheck, UpdateTransaction } from '../../types/update'
import { MSMError, ErrorType, errorMessage } from '../../types/errors'
import type { DeploymentLayout } from '../config/deployment'
import Downloader from '../utils/downloader'
import pathsafety from '../utils/pathsafety'
import utils from '../utils/utils'
import { getLogger, type Logger } from '../utils/logger'
import releases from './releases'

export interface UpdateCheckerOptions {
  http: HttpClient
  deployment: DeploymentLayout
  /** Version of the running application. */
  currentVersion: string
  /** URL of the release feed. */
  feedUrl: string
  /** [Optional: default is `false`] */
  includePrerelease?: boolean
  /** [Optional: default is `false`] In portable mode, use the installer if there is no portable archive. */
  allowInstallerFallback?: boolean
  /** [Optional: default is a new downloader] */
  downloader?: Downloader
  logger?: Logger
}

/**
 * Check the release feed for a new version of the application, and install it once verified.
 */
export default class UpdateChecker extends EventEmitter<UpdateEvents> {
  private readonly http: HttpClient
  private readonly deployment: DeploymentLayout
  private readonly currentVersion: string
  private readonly feedUrl: string
  private readonly includePrerelease: boolean
  private readonly allowInstallerFallback: boolean
  private readonly downloader: Downloader
  private readonly logger: Logger

  constructor(options: UpdateCheckerOptions) {
    super()
    this.http = options.http
    this.deployment = options.deployment
    this.currentVersion = releases.tagVersion(options.currentVersion)
    this.feedUrl = options.feedUrl
    this.includePrerelease = options.includePrerelease ?? false
    this.allowInstallerFallback = options.allowInstallerFallback ?? false
    this.downloader = options.downloader ?? new Downloader(this.http)
    this.logger = options.logger ?? getLogger('UpdateChecker')
  }

  /**
   * Compare the latest release of the feed with the running version.
   * @throws `CONFIG_ERROR` if no feed is configured, a network error if the feed cannot be read.
   */
  async checkLatest(options: { signal?: AbortSignal } = {}): Promise<UpdateCheck> {
    if (!this.feedUrl) throw new MSMError(ErrorType.CONFIG_ERROR, 'No release feed configured')

    let feed: Release[]
    try {
      feed = releases.parseReleases(await this.http.getJson(this.feedUrl, { signal: options.signal }))
    } catch (err) {
      this.logger.error(`Cannot read the release feed ${this.feedUrl}: ${errorMessage(err)}`)
      throw err
    }

    const currentVersion = this.currentVersion
    const release = releases.latestRelease(feed, this.includePrerelease)
    if (!release) {
      this.emit('update_check', { currentVersion, latestVersion: null })
      return { status: 'up_to_date', currentVersion, latestVersion: null }
    }

    const latestVersion = releases.tagVersion(release.tag_name)
    this.emit('update_check', { currentVersion, latestVersion })
    if (utils.compareVersions(latestVersion, currentVersion) <= 0) return { status: 'up_to_date', currentVersion, latestVersion }

    const selected = this.deployment.selectAsset(release, this.allowInstallerFallback)
    if (!selected) {
      this.logger.warn(`Release ${release.tag_name} has no asset for ${this.deployment.mode} mode`)
      return { status: 'no_asset', currentVersion, latestVersion }
    }

    const checksum = await this.findChecksum(release, selected.file.name, options.signal)
    const asset: ReleaseAsset = {
      tag: release.tag_name,
      version: latestVersion,
      name: selected.file.name,
      url: selected.file.browser_download_url,
      mode: selected.mode,
      checksum
    }
    const notes = release.body ?? null

    if (!checksum) {
      this.logger.warn(`No checksum published for ${asset.name}, the update cannot be verified`)
      return { status: 'unverifiable', currentVersion, latestVersion, asset, notes }
    }
    this.emit('update_debug', `Update ${latestVersion} available: ${asset.name} (${checksum.algorithm})`)
    return { status: 'available', currentVersion, latestVersion, asset, notes }
  }

  /**
   * Download the asset, verify its checksum, then install it with the deployment layout.
   * @throws `UNVERIFIABLE` (nothing is downloaded) if the asset has no checksum, `HASH_ERROR` (the
   * download is deleted, nothing else is touched) if the checksum does not match.
   */
  async apply(asset: ReleaseAsset, options: { signal?: AbortSignal } = {}): Promise<UpdateTransaction> {
    const checksum = asset.checksum
    if (!checksum) {
      const error = new MSMError(ErrorType.UNVERIFIABLE, `Refusing to install ${asset.name}: no published checksum`)
      this.logger.error(error.message)
      throw error
    }

    const tempDir = await fs.mkdtemp(path_.join(os.tmpdir(), 'msm-update-'))
    const assetPath = path_.join(tempDir, path_.basename(asset.name))
    let keep = false

    try {
      await this.downloader.download(asset.url, assetPath, { signal: options.signal, type: 'UPDATE' })

      const actual = await pathsafety.digest(assetPath, checksum.algorithm)
      if (actual !== checksum.digest.toLowerCase()) {
        throw new MSMError(ErrorType.HASH_ERROR, `Invalid ${checksum.algorithm} for ${asset.name}: expected ${checksum.digest}, got ${actual}`, {
          path: assetPath
        })
      }
      this.emit('update_verified', { name: asset.name, algorithm: checksum.algorithm })

      const transaction = await this.deployment.apply(assetPath, asset)
      // The installer runs from the downloaded file.
      keep = asset.mode !== 'portable'
      return transaction
    } catch (err) {
      const error = err instanceof MSMError ? err : new MSMError(ErrorType.INSTALL_ERROR, `Update failed: ${errorMessage(err)}`)
      this.logger.error(`Update to ${asset.version} failed: ${error.message}`)
      throw error
    } finally {
      if (!keep) await pathsafety.removePath(tempDir)
    }
  }

  /**
   * Restore the installation if an update was interrupted. Called once at startup.
   * @returns `true` if a backup was restored.
   */
  async recoverInterruptedUpdate(): Promise<boolean> {
    try {
      const restored = await this.deployment.recover()
      if (restored) this.logger.warn('An interrupted update was rolled back')
      return restored
    } catch (err) {
      const error = err instanceof MSMError ? err : new MSMError(ErrorType.FILE_ERROR, `Cannot recover the interrupted update: ${errorMessage(err)}`)
      this.logger.error(error.message)
      throw error
    }
  }

  /**
   * Checksum of an asset: from a sidecar or checksum list asset, else from the release notes.
   */
  private async findChecksum(release: Release, assetName: string, signal?: AbortSignal): Promise<Checksum | null> {
    for (const { file, sidecar } of releases.checksumAssets(release, assetName)) {
      try {
        const text = await this.http.getText(file.browser_download_url, { signal })
        const checksum = releases.parseChecksumText(text, assetName, !sidecar)
        if (checksum) return checksum
      } catch (err) {
        if (err instanceof MSMError && err.code === ErrorType.CANCELLED) throw err
        this.logger.warn(`Cannot read checksum file ${file.name}: ${errorMessage(err)}`)
      }
    }
    return release.body ? releases.parseChecksumText(release.body, assetName) : null
  }
}
