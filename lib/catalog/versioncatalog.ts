/**
 * @license MIT
 * @copyright Copyright (c) 2026, GoldFrite
 */

import fs from 'node:fs/promises'
import path_ from 'node:path'
import EventEmitter from '../utils/events'
import type { CatalogEvents } from '../../types/events'
import type { HttpClient } from '../../types/http'
import type {
  CacheDocument,
  CatalogResult,
  FetchOptions,
  LoaderFetchOptions,
  LoaderVersionEntry,
  VanillaFetchOptions,
  VanillaVersion
} from '../../types/version'
import { MSMError, ErrorType, errorMessage } from '../../types/errors'
import pathsafety from '../utils/pathsafety'
import utils from '../utils/utils'
import { retryOnce } from '../utils/http'
import { getLogger, type Logger } from '../utils/logger'
import Java from '../java/java'
import { fetchFabricVersions, isFabricCompatible } from './loaders/fabric'
import { fetchForgeVersions } from './loaders/forge'

export const VERSION_MANIFEST = 'https://piston-meta.mojang.com/mc/game/version_manifest.json'

const METADATA_CONCURRENCY = 10

type CacheName = 'vanilla' | 'vanilla_snapshots' | 'fabric' | 'forge'

export interface CatalogOptions {
  /** Folder of the cache files. */
  cacheDir: string
  /** [Optional: default is 6 hours] Age under which routine calls use the cache, in ms. */
  maxAge?: number
  /** [Optional: default is 30 days] Age over which the cache is not used when offline, in ms. */
  staleLimit?: number
  /** [Optional: default is `1000`] Delay before retrying a failed fetch, in ms. */
  retryDelay?: number
  logger?: Logger
}

/**
 * Fetch and cache the versions of Minecraft (vanilla) and of the loaders (Fabric, Forge).
 *
 * Routine calls use the cache if it is younger than `maxAge`. Otherwise the versions are fetched
 * (retried once), filtered and cached. When the network fails, the cache is used if younger than
 * `staleLimit`; if not, an empty `offline` result is returned.
 */
export default class VersionCatalog extends EventEmitter<CatalogEvents> {
  private readonly http: HttpClient
  private readonly cacheDir: string
  private readonly maxAge: number
  private readonly staleLimit: number
  private readonly retryDelay: number
  private readonly logger: Logger

  constructor(http: HttpClient, options: CatalogOptions) {
    super()
    this.http = http
    this.cacheDir = options.cacheDir
    this.maxAge = options.maxAge ?? 6 * 60 * 60 * 1000
    this.staleLimit = options.staleLimit ?? 30 * 24 * 60 * 60 * 1000
    this.retryDelay = options.retryDelay ?? 1000
    this.logger = options.logger ?? getLogger('VersionCatalog')
  }

  /**
   * Minecraft versions that publish a dedicated server, newest first.
   * @param options.includeSnapshots [Optional: default is `false`] Include snapshots.
   */
  async fetchVanillaVersions(options: VanillaFetchOptions & { signal?: AbortSignal } = {}): Promise<CatalogResult<VanillaVersion>> {
    const snapshots = options.includeSnapshots ?? false
    return this.fetchCached(snapshots ? 'vanilla_snapshots' : 'vanilla', options, isVanillaVersion, (cached) =>
      this.fetchVanilla(snapshots, cached, options.signal)
    )
  }

  /**
   * Versions of a loader. Pre-releases are filtered out unless `includePrerelease` is set.
   * @param options.gameVersion [Optional] Only keep the versions compatible with this Minecraft version.
   */
  async fetchLoaderVersions(
    kind: 'fabric' | 'forge',
    options: LoaderFetchOptions & { signal?: AbortSignal } = {}
  ): Promise<CatalogResult<LoaderVersionEntry>> {
    const result = await this.fetchCached(kind, options, isLoaderEntry, () =>
      kind === 'fabric' ? fetchFabricVersions(this.http, this.logger, options.signal) : fetchForgeVersions(this.http, options.signal)
    )

    const gameVersion = options.gameVersion
    const entries = result.entries.filter((entry) => {
      if (!options.includePrerelease && !entry.stable) return false
      if (!gameVersion) return true
      return kind === 'fabric' ? isFabricCompatible(gameVersion) : entry.gameVersion === gameVersion
    })
    return { ...result, entries }
  }

  /**
   * URL of the server jar of a Minecraft version.
   * @returns `null` if the version does not exist or publishes no server.
   */
  async getServerDownloadUrl(gameVersion: string): Promise<string | null> {
    return (await this.findVanilla(gameVersion))?.serverUrl ?? null
  }

  /**
   * Java major version required by a Minecraft version: from its metadata, or from the static map
   * when the metadata is not available.
   */
  async getRequiredJavaMajor(gameVersion: string): Promise<number> {
    return (await this.findVanilla(gameVersion))?.javaMajor ?? Java.getRequiredJavaVersion(gameVersion)
  }

  /**
   * Find a Minecraft version (releases first, then snapshots).
   */
  async findVanilla(gameVersion: string): Promise<VanillaVersion | null> {
    const releases = await this.fetchVanillaVersions()
    const release = releases.entries.find((v) => v.id === gameVersion)
    if (release || /^\d+\.\d+(\.\d+)?$/.test(gameVersion)) return release ?? null
    const all = await this.fetchVanillaVersions({ includeSnapshots: true })
    return all.entries.find((v) => v.id === gameVersion) ?? null
  }

  /**
   * Delete every cache file.
   */
  async clearCache() {
    const names: CacheName[] = ['vanilla', 'vanilla_snapshots', 'fabric', 'forge']
    for (const name of names) await fs.rm(this.cacheFile(name), { force: true })
  }

  cacheFile(name: CacheName) {
    return path_.join(this.cacheDir, `${name}_versions_cache.json`)
  }

  private async fetchCached<T>(
    name: CacheName,
    options: FetchOptions & { signal?: AbortSignal },
    check: (value: unknown) => value is T,
    fetcher: (cached: CacheDocument<T> | null) => Promise<T[]>
  ): Promise<CatalogResult<T>> {
    const kind = name === 'vanilla_snapshots' ? 'vanilla' : name
    const cached = await this.readCache(name, check)
    const age = cached ? Date.now() - cached.fetchedAt : Infinity

    if (!options.refresh && cached && age < this.maxAge) {
      this.emit('catalog_fetch', { kind, source: 'cache', count: cached.entries.length })
      return { entries: cached.entries, source: 'cache', stale: false, fetchedAt: cached.fetchedAt }
    }

    try {
      const entries = await retryOnce(() => fetcher(cached), this.retryDelay, options.signal)
      const document: CacheDocument<T> = { fetchedAt: Date.now(), entries }
      await this.writeCache(name, document)
      this.emit('catalog_fetch', { kind, source: 'network', count: entries.length })
      this.emit('catalog_debug', `Fetched ${entries.length} ${name} versions`)
      return { entries, source: 'network', stale: false, fetchedAt: document.fetchedAt }
    } catch (err) {
      if (err instanceof MSMError && (err.code === ErrorType.CANCELLED || err.category !== 'NETWORK')) throw err
      this.logger.warn(`Cannot fetch ${name} versions: ${errorMessage(err)}`)

      if (cached && age < this.staleLimit) {
        this.emit('catalog_fetch', { kind, source: 'cache', count: cached.entries.length })
        return { entries: cached.entries, source: 'cache', stale: true, fetchedAt: cached.fetchedAt }
      }
      this.emit('catalog_fetch', { kind, source: 'offline', count: 0 })
      return { entries: [], source: 'offline', stale: true, fetchedAt: null }
    }
  }

  private async writeCache<T>(name: CacheName, document: CacheDocument<T>) {
    try {
      await pathsafety.atomicWriteFile(this.cacheFile(name), JSON.stringify(document))
    } catch (err) {
      this.logger.warn(`Cannot write cache ${this.cacheFile(name)}: ${errorMessage(err)}`)
    }
  }

  private async readCache<T>(name: CacheName, check: (value: unknown) => value is T): Promise<CacheDocument<T> | null> {
    let raw: string
    try {
      raw = await fs.readFile(this.cacheFile(name), 'utf-8')
    } catch {
      return null
    }

    try {
      const data: unknown = JSON.parse(raw)
      if (utils.isRecord(data) && typeof data.fetchedAt === 'number' && Array.isArray(data.entries)) {
        const entries: unknown[] = data.entries
        return { fetchedAt: data.fetchedAt, entries: entries.filter(check) }
      }
    } catch (err) {
      this.logger.warn(`Corrupted cache ${this.cacheFile(name)}: ${errorMessage(err)}`)
      return null
    }
    this.logger.warn(`Invalid cache ${this.cacheFile(name)}, ignoring it`)
    return null
  }

  private async fetchVanilla(snapshots: boolean, cached: CacheDocument<VanillaVersion> | null, signal?: AbortSignal) {
    const manifest = await this.http.getJson(VERSION_MANIFEST, { signal })
    if (!utils.isRecord(manifest) || !Array.isArray(manifest.versions)) {
      throw new MSMError(ErrorType.FETCH_ERROR, 'Invalid version manifest')
    }

    const known = new Map((cached?.entries ?? []).map((v) => [v.url, v]))
    const listed: unknown[] = manifest.versions
    const versions = listed.filter(utils.isRecord).flatMap((v): { id: string; type: 'release' | 'snapshot'; url: string; releaseTime: string }[] => {
      const type = v.type === 'release' ? 'release' : snapshots && v.type === 'snapshot' ? 'snapshot' : null
      if (!type || typeof v.id !== 'string' || typeof v.url !== 'string') return []
      return [{ id: v.id, type, url: v.url, releaseTime: typeof v.releaseTime === 'string' ? v.releaseTime : '' }]
    })

    const result: (VanillaVersion | null)[] = versions.map((v) => known.get(v.url) ?? null)
    const queue = versions.map((v, i) => ({ v, i })).filter(({ i }) => result[i] === null)
    this.emit('catalog_debug', `${queue.length} version metadata to fetch`)

    // Metadata of versions that are not cached yet. A network failure fails the whole fetch, so
    // that a partial list is never cached.
    let failure: MSMError | null = null
    const workers = Array(METADATA_CONCURRENCY)
      .fill(null)
      .map(async () => {
        while (queue.length > 0 && !failure) {
          const item = queue.shift()
          if (!item) break
          try {
            const meta = await this.http.getJson(item.v.url, { signal })
            result[item.i] = parseVersionMetadata(item.v, meta)
          } catch (err) {
            if (err instanceof MSMError && (err.code === ErrorType.CANCELLED || err.category === 'NETWORK')) {
              failure ??= err
              break
            }
            this.logger.warn(`Cannot read the metadata of ${item.v.id}: ${errorMessage(err)}`)
          }
        }
      })
    await Promise.all(workers)
    if (failure) throw failure

    return result.filter((v): v is VanillaVersion => v !== null)
  }
}

/**
 * Build a version from its metadata.
 * @returns `null` if the version does not publish a server.
 */
export function parseVersionMetadata(
  version: { id: string; type: 'release' | 'snapshot'; url: string; releaseTime: string },
  meta: unknown
): VanillaVersion | null {
  if (!utils.isRecord(meta)) return null
  const downloads = utils.isRecord(meta.downloads) ? meta.downloads : {}
  const server = utils.isRecord(downloads.server) ? downloads.server : null
  if (!server || typeof server.url !== 'string' || !server.url) return null

  const javaVersion = utils.isRecord(meta.javaVersion) ? meta.javaVersion : {}
  return {
    ...version,
    serverUrl: server.url,
    serverSha1: typeof server.sha1 === 'string' ? server.sha1 : null,
    javaMajor: typeof javaVersion.majorVersion === 'number' ? javaVersion.majorVersion : Java.getRequiredJavaVersion(version.id)
  }
}

function isVanillaVersion(value: unknown): value is VanillaVersion {
  return (
    utils.isRecord(value) &&
    typeof value.id === 'string' &&
    (value.type === 'release' || value.type === 'snapshot') &&
    typeof value.url === 'string' &&
    typeof value.releaseTime === 'string' &&
    typeof value.serverUrl === 'string' &&
    (value.serverSha1 === null || typeof value.serverSha1 === 'string') &&
    typeof value.javaMajor === 'number'
  )
}

function isLoaderEntry(value: unknown): value is LoaderVersionEntry {
  return (
    utils.isRecord(value) &&
    (value.kind === 'fabric' || value.kind === 'forge') &&
    typeof value.version === 'string' &&
    typeof value.gameVersion === 'string' &&
    typeof value.stable === 'boolean' &&
    typeof value.url === 'string'
  )
}
