import type { InstallStage } from './loader'
import type { ServerState } from './server'
import type { CatalogSource } from './version'

export interface DownloaderEvents {
  download_progress: [
    {
      total: { amount: number; size: number }
      downloaded: { amount: number; size: number }
      speed: number
      type: string
    }
  ]
  download_error: [{ filename: string; type: string; message: Error | string }]
  download_end: [{ downloaded: { amount: number; size: number } }]
}

export interface ProcessEvents {
  process_line: [{ pid: number; line: string; stream: 'stdout' | 'stderr' }]
  process_exit: [{ pid: number; code: number | null; signal: NodeJS.Signals | null }]
}

export interface ConfigStoreEvents {
  registry_saved: [{ path: string; count: number }]
}

export interface CatalogEvents {
  catalog_fetch: [{ kind: 'vanilla' | 'fabric' | 'forge'; source: CatalogSource; count: number }]
  catalog_debug: [string]
}

export interface JavaEvents {
  java_info: [{ version: string; arch: '32-bit' | '64-bit' }]
  java_discovered: [{ count: number; best: { version: string; path: string } | null }]
  java_download_progress: [{ major: number; percent: number; downloadedSize: number; totalSize: number; speed: number }]
  java_installed: [{ major: number; path: string }]
}

export interface LoaderEvents {
  /**
   * Emitted when the installation enters a new stage.
   */
  install_stage: [{ serverId: string; stage: InstallStage; previous: InstallStage }]
  /**
   * Emitted with a percentage (0-100) of the whole installation.
   */
  install_progress: [{ serverId: string; stage: InstallStage; percent: number; message: string }]
  /**
   * Emitted for each line printed by the loader installer.
   */
  install_output: [{ serverId: string; line: string }]
  install_debug: [string]
}

export interface ServerManagerEvents {
  server_state: [{ id: string; from: ServerState; to: ServerState; exitCode?: number | null }]
  server_debug: [string]
}

export interface UpdateEvents {
  update_check: [{ currentVersion: string; latestVersion: string | null }]
  update_verified: [{ name: string; algorithm: string }]
  update_debug: [string]
}

export type CoreEvents = DownloaderEvents &
  ProcessEvents &
  ConfigStoreEvents &
  CatalogEvents &
  JavaEvents &
  LoaderEvents &
  ServerManagerEvents &
  UpdateEvents
