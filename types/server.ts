export type LoaderKind = 'vanilla' | 'fabric' | 'forge'

export const LOADER_KINDS: readonly LoaderKind[] = ['vanilla', 'fabric', 'forge']

/**
 * Lifecycle state of a configured server.
 */
export type ServerState = 'CONFIGURED' | 'STARTING' | 'RUNNING' | 'STOPPING' | 'CRASH_EXITED'

/**
 * A configured server, as stored in the registry document.
 */
export interface ServerRecord {
  /** Stable unique ID (UUID v4). */
  id: string
  /** Display name. */
  name: string
  /** Absolute path to the server directory. */
  path: string
  loaderKind: LoaderKind
  /** Target Minecraft version (eg. `'1.20.1'`). */
  gameVersion: string
  /** Loader version, `null` for vanilla servers. */
  loaderVersion: string | null
  /** Network port (`server-port`), `null` if not set. */
  port: number | null
  /** Java executable used to run the server, `null` to resolve it at start. */
  javaPath: string | null
  /** Folder where `world` backups are stored, `null` if not set. */
  backupPath: string | null
  /** Last known state, informational only. */
  lastState: ServerState
  /** Maximum memory (`-Xmx`), in MB. */
  memoryMaxMb: number
  /** Minimum memory (`-Xms`), in MB, `null` to let Java decide. */
  memoryMinMb: number | null
  eulaAccepted: boolean
}

export type ServerRegistry = ServerRecord[]

/**
 * Parameters to create a new server.
 */
export interface ServerSpec {
  name: string
  loaderKind: LoaderKind
  gameVersion: string
  loaderVersion?: string | null
  port?: number | null
  javaPath?: string | null
  backupPath?: string | null
  memoryMaxMb?: number
  memoryMinMb?: number | null
  /** [Optional] `server.properties` overrides. */
  properties?: Record<string, string>
}

/**
 * Fields the user may change on an existing record.
 */
export type ServerPatch = Partial<Omit<ServerRecord, 'id'>>

export interface ResourceSample {
  /** Sampled at (ms since epoch). */
  at: number
  cpuPercent: number
  memoryMb: number
}

/**
 * Public view of a running server process.
 */
export interface RunningInstance {
  id: string
  pid: number
  startedAt: number
  lastSample: ResourceSample | null
}

export interface ServerSnapshot extends ServerRecord {
  state: ServerState
  instance: RunningInstance | null
}

export type ServerEvent =
  | { type: 'state'; id: string; from: ServerState; to: ServerState; exitCode?: number | null }
  | { type: 'log'; id: string; line: string }
  | { type: 'sample'; id: string; sample: ResourceSample }
  | { type: 'error'; id: string; code: string; message: string }

export type ServerListener = (event: ServerEvent) => void

export interface StopResult {
  stopped: boolean
  reason?: 'NOT_RUNNING'
  exitCode?: number | null
}

export interface DetectionConflict {
  path: string
  ids: string[]
}

export interface DetectionResult {
  imported: ServerRecord[]
  updated: ServerRecord[]
  unchanged: ServerRecord[]
  /** Records whose directory no longer exists. */
  missing: ServerRecord[]
  conflicts: DetectionConflict[]
}

/**
 * What could be detected from a server directory.
 */
export interface DetectedServer {
  path: string
  loaderKind: LoaderKind | null
  gameVersion: string | null
  loaderVersion: string | null
  launchScript: string | null
  eulaAccepted: boolean
  port: number | null
  memoryMaxMb: number | null
  memoryMinMb: number | null
}
