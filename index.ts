/**
 * @license MIT
 * @copyright Copyright (c) 2026, GoldFrite
 */

import Core from './lib/core'
import ConfigStore from './lib/config/configstore'
import VersionCatalog from './lib/catalog/versioncatalog'
import Java from './lib/java/java'
import AdoptiumProvider from './lib/java/adoptium'
import LoaderManager from './lib/loader/loadermanager'
import ProcessRunner, { ProcessHandle } from './lib/process/processrunner'
import ServerManager from './lib/server/servermanager'
import UpdateChecker from './lib/update/updatechecker'
import Downloader from './lib/utils/downloader'
import FetchHttpClient from './lib/utils/http'
import pathsafety from './lib/utils/pathsafety'
import properties from './lib/server/properties'
import mods from './lib/server/mods'
import releases from './lib/update/releases'
import { Mutex, KeyedMutex } from './lib/utils/mutex'
import { resolveConfig } from './lib/config/config'
import { detectDeployment, InstalledDeployment, PortableDeployment } from './lib/config/deployment'
import { initLogger, getLogger } from './lib/utils/logger'

export {
  Core,
  ConfigStore,
  VersionCatalog,
  Java,
  AdoptiumProvider,
  LoaderManager,
  ProcessRunner,
  ProcessHandle,
  ServerManager,
  UpdateChecker,
  Downloader,
  FetchHttpClient,
  pathsafety,
  properties,
  mods,
  releases,
  Mutex,
  KeyedMutex,
  resolveConfig,
  detectDeployment,
  InstalledDeployment,
  PortableDeployment,
  initLogger,
  getLogger
}
export default Core

export type { DeploymentLayout, DeploymentCollaborators } from './lib/config/deployment'
export type { StartOptions } from './lib/process/processrunner'
export type { DownloadOptions, DownloadProgress } from './lib/utils/downloader'
export type { ServerManagerOptions, ServerInstaller, CreateOptions } from './lib/server/servermanager'
export type { LoaderManagerOptions } from './lib/loader/loadermanager'
export type { UpdateCheckerOptions } from './lib/update/updatechecker'
export type { CatalogOptions } from './lib/catalog/versioncatalog'
export type { JavaOptions } from './lib/java/java'
export type { AdoptiumOptions } from './lib/java/adoptium'
export type { ResourceSampler } from './lib/server/resources'
export type { Properties } from './lib/server/properties'
export type { Logger } from './lib/utils/logger'

export * from './types/config'
export * from './types/errors'
export type * from './types/events'
export type * from './types/http'
export type * from './types/java'
export type * from './types/loader'
export type * from './types/mod'
export * from './types/server'
export type * from './types/update'
export type * from './types/version'
