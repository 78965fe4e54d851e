import type { LoaderKind } from './server'

/**
 * A Minecraft version that publishes a dedicated server download.
 */
export interface VanillaVersion {
  id: string
  type: 'release' | 'snapshot'
  releaseTime: string
  /** URL of the version metadata. */
  url: string
  /** URL of the server jar. */
  serverUrl: string
  /** SHA1 of the server jar, when published. */
  serverSha1: string | null
  /** Required Java major version. */
  javaMajor: number
}

export interface LoaderVersionEntry {
  kind: Exclude<LoaderKind, 'vanilla'>
  version: string
  /** Compatible Minecraft version, `'*'` when the loader is version-independent (Fabric). */
  gameVersion: string
  stable: boolean
  /** URL of the installer. */
  url: string
}

export type CatalogSource = 'network' | 'cache' | 'offline'

export interface CatalogResult<T> {
  entries: T[]
  /**
   * `'network'`: freshly fetched; `'cache'`: read from the cache file (fresh, or as an offline
   * fallback when `stale` is `true`); `'offline'`: network failed and no usable cache exists.
   */
  source: CatalogSource
  /** Whether the entries come from the cache because the network failed. */
  stale: boolean
  fetchedAt: number | null
}

export interface CacheDocument<T> {
  fetchedAt: number
  entries: T[]
}

export interface FetchOptions {
  /** Bypass the cache. */
  refresh?: boolean
}

export interface VanillaFetchOptions extends FetchOptions {
  includeSnapshots?: boolean
}

export interface LoaderFetchOptions extends FetchOptions {
  includePrerelease?: boolean
  /** Only keep entries compatible with this Minecraft version. */
  gameVersion?: string
}
