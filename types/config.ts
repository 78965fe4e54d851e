import type { HttpClient } from './http'
import type { JavaProvider } from './java'
import type { DeploymentMode, InstallerLauncher, UpdateSwapper } from './update'

export type LogLevel = 'error' | 'warn' | 'info' | 'verbose' | 'debug' | 'silly'

export interface Config {
  /**
   * The folder where servers are created and detected. The registry document
   * (`servers_config.json`) is stored in this folder.
   */
  serversRoot: string
  /**
   * [Optional: default is the folder of the running executable]
   * The folder of the application. A `.portable` file (or a `.config` folder) in this folder
   * switches the application to portable mode.
   */
  appDir?: string
  /**
   * [Optional: default depends on the deployment mode]
   * The folder of the application data (logs, cache): `<appDir>/.config` in portable mode,
   * `%LOCALAPPDATA%/Programs/MinecraftServerManager` in installed mode.
   */
  dataDir?: string
  /**
   * [Optional: default is `'0.0.0'`]
   * The current version of the application, compared with the release feed.
   */
  appVersion?: string
  /**
   * [Optional: default is `'info'`]
   * Minimum level written to the log file.
   */
  logLevel?: LogLevel
  /**
   * [Optional: default is the GitHub releases of `owner/repo`]
   * Release feed of the application.
   */
  releases?: {
    owner?: string
    repo?: string
    /** [Optional] Custom feed URL, returning a list of releases. */
    url?: string
    /** [Optional: default is `false`] Consider pre-releases. */
    includePrerelease?: boolean
    /**
     * [Optional: default is `false`]
     * In portable mode, use the installer when the release has no portable archive.
     */
    allowInstallerFallback?: boolean
  }
  /**
   * [Optional] Timeouts, in ms.
   */
  timeouts?: {
    /** [Optional: default is `15000`] Network operations. */
    http?: number
    /** [Optional: default is `10000`] Graceful stop before escalating to a forced stop. */
    stop?: number
  }
  /**
   * [Optional] Version catalog cache.
   */
  catalog?: {
    /** [Optional: default is 6 hours] Age under which routine calls use the cache, in ms. */
    maxAge?: number
    /** [Optional: default is 30 days] Age over which the cache is not used as an offline fallback, in ms. */
    staleLimit?: number
  }
  /**
   * [Optional: default is `1000`] Interval between resource samples of running servers, in ms.
   */
  pollInterval?: number
  /**
   * [Optional: default is `1000`] Number of output lines kept per running server.
   */
  outputQueueSize?: number
  /**
   * [Optional] Collaborators. Defaults are provided for the HTTP client only.
   */
  http?: HttpClient
  javaProvider?: JavaProvider
  swapper?: UpdateSwapper
  installerLauncher?: InstallerLauncher
}

export interface FullConfig {
  serversRoot: string
  appDir: string
  appVersion: string
  logLevel: LogLevel
  /** Deployment mode, detected from the content of `appDir`. */
  mode: DeploymentMode
  /** Application data folder (logs, cache). */
  dataDir: string
  /** `<dataDir>/Cache`, where version catalogs are cached. */
  cacheDir: string
  registryFile: string
  releases: {
    owner: string
    repo: string
    url: string
    includePrerelease: boolean
    allowInstallerFallback: boolean
  }
  timeouts: {
    http: number
    stop: number
  }
  catalog: {
    maxAge: number
    staleLimit: number
  }
  pollInterval: number
  outputQueueSize: number
}
