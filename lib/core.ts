/**
 * @license MIT
 * @copyright Copyright (c) 2026, GoldFrite
 */

import path_ from 'node:path'
import EventEmitter from './utils/events'
import type { CoreEvents } from '../types/events'
import type { Config, FullConfig } from '../types/config'
import type { HttpClient } from '../types/http'
import type { JavaProvider } from '../types/java'
import type { DeploymentLayout } from './config/deployment'
import { resolveConfig } from './config/config'
import ConfigStore from './config/configstore'
import VersionCatalog from './catalog/versioncatalog'
import Java from './java/java'
import AdoptiumProvider from './java/adoptium'
import LoaderManager from './loader/loadermanager'
import ProcessRunner from './process/processrunner'
import ServerManager from './server/servermanager'
import UpdateChecker from './update/updatechecker'
import Downloader from './utils/downloader'
import FetchHttpClient from './utils/http'
import { getLogger, initLogger } from './utils/logger'

/**
 * Entry point of the library: builds every component from a single configuration and forwards
 * their events.
 *
 * ```ts
 * const core = new Core({ serversRoot: '/srv/minecraft', appVersion: '1.6.5' })
 * await core.init()
 * const server = await core.servers.create({ name: 'survival', loaderKind: 'vanilla', gameVersion: '1.21.1' })
 * await core.servers.start(server.id)
 * ```
 */
export default class Core extends EventEmitter<CoreEvents> {
  readonly config: FullConfig
  readonly deployment: DeploymentLayout
  readonly http: HttpClient
  readonly store: ConfigStore
  readonly catalog: VersionCatalog
  readonly java: Java
  readonly runner: ProcessRunner
  readonly downloader: Downloader
  readonly javaProvider: JavaProvider
  readonly loaders: LoaderManager
  readonly servers: ServerManager
  readonly updates: UpdateChecker
  private readonly logger = getLogger('Core')

  /**
   * @param config The configuration of the application.
   */
  constructor(config: Config) {
    super()
    const resolved = resolveConfig(config)
    this.config = resolved.config
    this.deployment = resolved.deployment
    this.http = config.http ?? new FetchHttpClient(this.config.timeouts.http, `msm-core/${this.config.appVersion}`)

    this.store = new ConfigStore(this.config.registryFile)
    this.catalog = new VersionCatalog(this.http, {
      cacheDir: this.config.cacheDir,
      maxAge: this.config.catalog.maxAge,
      staleLimit: this.config.catalog.staleLimit
    })
    const runtimeDir = path_.join(this.config.dataDir, 'runtime')
    this.java = new Java({ runtimeDir })
    this.runner = new ProcessRunner()
    this.downloader = new Downloader(this.http)
    // Temurin runtimes from Adoptium unless the application provides Java itself
    let adoptium: AdoptiumProvider | null = null
    if (config.javaProvider) {
      this.javaProvider = config.javaProvider
    } else {
      adoptium = new AdoptiumProvider({ http: this.http, downloader: this.downloader, java: this.java, runtimeDir })
      this.javaProvider = adoptium
    }
    this.loaders = new LoaderManager({
      catalog: this.catalog,
      java: this.java,
      runner: this.runner,
      downloader: this.downloader,
      javaProvider: this.javaProvider
    })
    this.servers = new ServerManager({
      serversRoot: this.config.serversRoot,
      store: this.store,
      runner: this.runner,
      installer: this.loaders,
      stopTimeout: this.config.timeouts.stop,
      pollInterval: this.config.pollInterval,
      outputQueueSize: this.config.outputQueueSize
    })
    this.updates = new UpdateChecker({
      http: this.http,
      deployment: this.deployment,
      currentVersion: this.config.appVersion,
      feedUrl: this.config.releases.url,
      includePrerelease: this.config.releases.includePrerelease,
      allowInstallerFallback: this.config.releases.allowInstallerFallback,
      downloader: this.downloader
    })

    for (const component of [this.store, this.catalog, this.java, this.runner, this.downloader, this.loaders, this.servers, this.updates]) {
      component.forwardEvents(this)
    }
    adoptium?.forwardEvents(this)
  }

  /**
   * Start logging to `<dataDir>/logs/main.log`, roll back an interrupted update, then load the
   * registry.
   */
  async init() {
    const logFile = initLogger(this.config.dataDir, this.config.logLevel)
    this.logger.info(`Starting (${this.config.mode} mode, version ${this.config.appVersion}), logging to ${logFile}`)
    await this.updates.recoverInterruptedUpdate()
    const registry = await this.store.load()
    this.logger.info(`${registry.length} server(s) registered in ${this.config.registryFile}`)
  }

  /**
   * Stop every running server and flush the registry.
   */
  async shutdown() {
    await this.servers.shutdown()
    this.logger.info('Stopped')
  }
}
