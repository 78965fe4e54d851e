/**
 * @license MIT
 * @copyright Copyright (c) 2026, GoldFrite
 */

import fs from 'node:fs/promises'
import net from 'node:net'
import path_ from 'node:path'
import { v4 as uuidv4 } from 'uuid'
import EventEmitter from '../utils/events'
import type { ServerManagerEvents } from '../../types/events'
import type {
  DetectedServer,
  DetectionResult,
  ResourceSample,
  RunningInstance,
  ServerEvent,
  ServerListener,
  ServerPatch,
  ServerRecord,
  ServerSnapshot,
  ServerSpec,
  ServerState,
  StopResult
} from '../../types/server'
import type { ExecuteOptions } from '../../types/loader'
import { MSMError, ErrorType, errorMessage } from '../../types/errors'
import type ConfigStore from '../config/configstore'
import type LoaderManager from '../loader/loadermanager'
import type ProcessRunner from '../process/processrunner'
import type { ProcessHandle } from '../process/processrunner'
import pathsafety from '../utils/pathsafety'
import { KeyedMutex } from '../utils/mutex'
import utils from '../utils/utils'
import { getLogger, type Logger } from '../utils/logger'
import properties from './properties'
import { detectServer, findLaunchScript, findServerJar, FORGE_ARGS_FILE, isEulaAccepted, LAUNCH_SCRIPT_NAMES, scriptExtension } from './detection'
import { scriptCommand, writeForgeJvmArgs, writeLaunchScript } from './launchscript'
import { SystemResourceSampler, type ResourceSampler } from './resources'

const DEFAULT_PORT = 25565
const DEFAULT_MEMORY_MB = 2048
const STOP_COMMAND = 'stop'

export type ServerInstaller = Pick<LoaderManager, 'resolveInstall' | 'execute'>

export interface ServerManagerOptions {
  /** Folder where servers are created. */
  serversRoot: string
  store: ConfigStore
  runner: ProcessRunner
  installer: ServerInstaller
  /** [Optional: default uses `ps` / `tasklist`] */
  sampler?: ResourceSampler
  /** [Optional: default is `10000`] Wait after the `stop` command before terminating, in ms. */
  stopTimeout?: number
  /** [Optional: default is `1000`] Interval between resource samples, in ms. */
  pollInterval?: number
  /** [Optional: default is `1000`] Output lines kept per running server. */
  outputQueueSize?: number
  logger?: Logger
}

export interface CreateOptions extends ExecuteOptions {
  /** [Optional: default is `true`] Install the server software. If `false`, only the folder is prepared. */
  install?: boolean
}

interface LiveServer {
  state: ServerState
  handle: ProcessHandle | null
  instance: RunningInstance | null
  stopRequested: boolean
  /** Settles once the exit of the process has been handled. */
  exited: Promise<void> | null
  timer: NodeJS.Timeout | null
}

/**
 * Check that nothing listens on a TCP port.
 */
export function isPortFree(port: number): Promise<boolean> {
  return new Promise((resolve) => {
    const server = net.createServer()
    server.once('error', () => resolve(false))
    server.once('listening', () => server.close(() => resolve(true)))
    server.listen(port)
  })
}

function samePath(a: string, b: string) {
  return path_.resolve(a) === path_.resolve(b)
}

/**
 * Create, detect, start and stop servers.
 *
 * States: `CONFIGURED -> STARTING -> RUNNING -> STOPPING -> CONFIGURED`. A process that exits without
 * a stop request goes through `CRASH_EXITED` back to `CONFIGURED`. Operations on the same server are
 * serialized.
 */
export default class ServerManager extends EventEmitter<ServerManagerEvents> {
  readonly serversRoot: string
  private readonly store: ConfigStore
  private readonly runner: ProcessRunner
  private readonly installer: ServerInstaller
  private readonly sampler: ResourceSampler
  private readonly stopTimeout: number
  private readonly pollInterval: number
  private readonly outputQueueSize: number
  private readonly logger: Logger

  private readonly locks = new KeyedMutex()
  private readonly live = new Map<string, LiveServer>()
  private readonly listeners = new Map<string, Set<ServerListener>>()

  constructor(options: ServerManagerOptions) {
    super()
    this.serversRoot = path_.resolve(options.serversRoot)
    this.store = options.store
    this.runner = options.runner
    this.installer = options.installer
    this.logger = options.logger ?? getLogger('ServerManager')
    this.sampler = options.sampler ?? new SystemResourceSampler(this.logger)
    this.stopTimeout = options.stopTimeout ?? 10000
    this.pollInterval = options.pollInterval ?? 1000
    this.outputQueueSize = options.outputQueueSize ?? 1000
  }

  /**
   * Create a server: folder, `eula.txt`, `server.properties`, installation of the server software,
   * launch script, then the record.
   * @throws `PATH_TRAVERSAL` if the name escapes the servers folder, `CONFLICT` if the folder is not
   * empty, `CONFIG_ERROR` for invalid properties, or the error of the installation (the folder is
   * removed).
   */
  async create(spec: ServerSpec, options: CreateOptions = {}): Promise<ServerRecord> {
    const name = spec.name.trim()
    if (!name || name === '.' || name === '..' || /[\\/]/.test(name)) {
      throw new MSMError(ErrorType.CONFIG_ERROR, `Invalid server name "${spec.name}"`)
    }
    const dir = path_.join(this.serversRoot, name)
    if (!(await pathsafety.isWithin(dir, this.serversRoot))) {
      throw new MSMError(ErrorType.PATH_TRAVERSAL, `Server folder ${dir} is outside ${this.serversRoot}`, { path: dir })
    }

    const port = spec.port ?? DEFAULT_PORT
    const props = properties.withDefaults({ motd: name, ...spec.properties, 'server-port': String(port) })
    const invalid = properties.validateAll(props)
    if (invalid.length > 0) throw new MSMError(ErrorType.CONFIG_ERROR, `Invalid server properties: ${invalid.join('; ')}`)

    let record: ServerRecord = {
      id: uuidv4(),
      name,
      path: dir,
      loaderKind: spec.loaderKind,
      gameVersion: spec.gameVersion,
      loaderVersion: spec.loaderVersion ?? null,
      port,
      javaPath: spec.javaPath ?? null,
      backupPath: spec.backupPath ?? null,
      lastState: 'CONFIGURED',
      memoryMaxMb: spec.memoryMaxMb ?? DEFAULT_MEMORY_MB,
      memoryMinMb: spec.memoryMinMb ?? null,
      eulaAccepted: true
    }

    return this.locks.run(`create:${dir}`, async () => {
      if ((await pathsafety.exists(dir)) && (await fs.readdir(dir)).length > 0) {
        throw new MSMError(ErrorType.CONFLICT, `Folder ${dir} already exists and is not empty`, { path: dir })
      }
      const owner = (await this.store.list()).find((r) => samePath(r.path, dir))
      if (owner) throw new MSMError(ErrorType.CONFLICT, `Folder ${dir} is used by server ${owner.name}`, { path: dir, serverId: owner.id })

      // Set once another record claims the folder, which must then be left as it is
      let claimed = false
      try {
        const folders = spec.loaderKind === 'vanilla' ? ['world', 'logs'] : ['world', 'plugins', 'mods', 'config', 'logs']
        for (const folder of folders) await fs.mkdir(path_.join(dir, folder), { recursive: true })
        await this.writeEula(dir)
        await properties.write(path_.join(dir, 'server.properties'), props)

        if (options.install ?? true) record = await this.install(record, spec.loaderVersion ?? null, options)
        await this.writeLaunchFiles(record)
        const added = record
        await this.store.transaction((registry) => {
          const other = registry.find((r) => r.id === added.id || samePath(r.path, dir))
          if (other) {
            claimed = true
            throw new MSMError(ErrorType.CONFLICT, `Folder ${dir} is used by server ${other.name}`, { path: dir, serverId: other.id })
          }
          return { registry: [...registry, added], result: added }
        })
      } catch (err) {
        if (!claimed) await pathsafety.removePath(dir)
        this.logger.error(`Cannot create server ${name}: ${errorMessage(err)}`)
        if (err instanceof MSMError) throw err
        throw new MSMError(ErrorType.FILE_ERROR, `Cannot create server ${name}: ${errorMessage(err)}`, { path: dir })
      }

      this.logger.info(`Server ${name} (${record.loaderKind} ${record.gameVersion}) created in ${dir}`)
      return record
    })
  }

  /**
   * Scan the sub-folders of `rootDir` for servers and reconcile them with the registry. New servers
   * are imported; known ones get their loader and versions refreshed while user settings are kept.
   * A folder claimed by several records is reported as a conflict and left untouched.
   * @param rootDir [Optional: default is the servers folder]
   */
  async detectExisting(rootDir: string = this.serversRoot): Promise<DetectionResult> {
    const root = path_.resolve(rootDir)
    let names: string[] = []
    try {
      names = (await fs.readdir(root, { withFileTypes: true })).filter((e) => e.isDirectory()).map((e) => e.name)
    } catch (err) {
      throw new MSMError(ErrorType.FILE_ERROR, `Cannot scan ${root}: ${errorMessage(err)}`, { path: root })
    }

    const detected: DetectedServer[] = []
    for (const name of names) {
      const server = await detectServer(path_.join(root, name))
      if (server) detected.push(server)
    }

    const missing: ServerRecord[] = []
    for (const record of await this.store.list()) {
      if (!(await pathsafety.exists(record.path))) missing.push(record)
    }

    const result = await this.store.transaction((registry) => {
      const byPath = new Map<string, ServerRecord[]>()
      for (const record of registry) {
        const key = path_.resolve(record.path)
        byPath.set(key, [...(byPath.get(key) ?? []), record])
      }

      const result: DetectionResult = { imported: [], updated: [], unchanged: [], missing, conflicts: [] }
      for (const [key, records] of byPath) {
        if (records.length > 1) result.conflicts.push({ path: key, ids: records.map((r) => r.id) })
      }

      let next = registry
      for (const server of detected) {
        const claimed = byPath.get(path_.resolve(server.path)) ?? []
        if (claimed.length > 1) continue

        if (claimed.length === 0) {
          const record: ServerRecord = {
            id: uuidv4(),
            name: path_.basename(server.path),
            path: server.path,
            loaderKind: server.loaderKind ?? 'vanilla',
            gameVersion: server.gameVersion ?? 'unknown',
            loaderVersion: server.loaderKind === 'vanilla' ? null : server.loaderVersion,
            port: server.port,
            javaPath: null,
            backupPath: null,
            lastState: 'CONFIGURED',
            memoryMaxMb: server.memoryMaxMb ?? DEFAULT_MEMORY_MB,
            memoryMinMb: server.memoryMinMb,
            eulaAccepted: server.eulaAccepted
          }
          next = [...next, record]
          result.imported.push(record)
          continue
        }

        const current = claimed[0]
        const loaderKind = server.loaderKind ?? current.loaderKind
        const merged: ServerRecord = {
          ...current,
          loaderKind,
          gameVersion: server.gameVersion ?? current.gameVersion,
          loaderVersion: loaderKind === 'vanilla' ? null : (server.loaderVersion ?? current.loaderVersion),
          eulaAccepted: server.eulaAccepted
        }
        const changed =
          merged.loaderKind !== current.loaderKind ||
          merged.gameVersion !== current.gameVersion ||
          merged.loaderVersion !== current.loaderVersion ||
          merged.eulaAccepted !== current.eulaAccepted
        if (changed) {
          next = next.map((r) => (r.id === current.id ? merged : r))
          result.updated.push(merged)
        } else {
          result.unchanged.push(current)
        }
      }

      return { registry: next, result }
    })

    for (const conflict of result.conflicts) {
      this.logger.warn(`Folder ${conflict.path} is claimed by several servers: ${conflict.ids.join(', ')}`)
    }
    this.logger.info(
      `Detection in ${root}: ${result.imported.length} imported, ${result.updated.length} updated, ` +
        `${result.missing.length} missing, ${result.conflicts.length} conflicts`
    )
    return result
  }

  /**
   * Start a server. If it is already running, the running instance is returned and nothing is spawned.
   * @throws `NOT_FOUND` if the server or its launch script does not exist, `BUSY` if the port is in
   * use, `CONFIG_ERROR` if the EULA is not accepted, `EXEC_ERROR` if the process cannot be spawned.
   */
  async start(id: string): Promise<RunningInstance> {
    return this.locks.run(id, async () => {
      const running = this.live.get(id)?.instance
      if (running) return running

      const record = await this.requireRecord(id)
      const script = await this.prepareStart(record)

      this.setState(id, 'STARTING')
      let handle: ProcessHandle
      try {
        const { executable, args } = scriptCommand(script)
        handle = await this.runner.start(executable, args, {
          cwd: record.path,
          stdin: 'pipe',
          env: this.environment(record),
          queueSize: this.outputQueueSize,
          processGroup: true
        })
      } catch (err) {
        this.setState(id, 'CONFIGURED')
        this.logger.error(`Cannot start ${record.name}: ${errorMessage(err)}`)
        this.dispatch({ type: 'error', id, code: err instanceof MSMError ? err.code : ErrorType.EXEC_ERROR, message: errorMessage(err) })
        throw err
      }

      const instance: RunningInstance = { id, pid: handle.pid, startedAt: handle.startedAt, lastSample: null }
      const live = this.getLive(id)
      live.handle = handle
      live.instance = instance
      live.stopRequested = false
      live.exited = handle
        .wait()
        .then((code) => this.onExit(id, handle, code))
        .catch((err) => this.logger.error(`Cannot handle the exit of ${record.name}: ${errorMessage(err)}`))
      live.timer = this.startSampling(id, handle)

      handle.on('process_line', ({ line }) => this.dispatch({ type: 'log', id, line }))
      this.setState(id, 'RUNNING')
      this.logger.info(`Server ${record.name} started (PID ${handle.pid})`)
      await this.persistState(id, 'RUNNING')
      return instance
    })
  }

  /**
   * Stop a server: `stop` command on stdin (if `graceful`), then SIGTERM, then SIGKILL, each after
   * the stop timeout.
   * @returns `{ stopped: false, reason: 'NOT_RUNNING' }` if the server is not running.
   */
  async stop(id: string, graceful: boolean = true): Promise<StopResult> {
    return this.locks.run(id, async (): Promise<StopResult> => {
      const live = this.live.get(id)
      const handle = live?.handle
      if (!live || !handle || !live.instance) return { stopped: false, reason: 'NOT_RUNNING' }

      live.stopRequested = true
      this.setState(id, 'STOPPING')
      let exitCode: number | null
      try {
        exitCode = await handle.terminate(graceful, this.stopTimeout, graceful ? STOP_COMMAND : undefined)
      } catch (err) {
        this.logger.error(`Cannot stop server ${id}: ${errorMessage(err)}`)
        // Still alive: back to RUNNING. Otherwise the exit handler moves it to CONFIGURED.
        if (handle.running) {
          live.stopRequested = false
          this.setState(id, 'RUNNING')
        }
        const code = err instanceof MSMError ? err.code : ErrorType.PROCESS_ERROR
        this.dispatch({ type: 'error', id, code, message: `Cannot stop server ${id}: ${errorMessage(err)}` })
        throw err
      }
      await live.exited
      return { stopped: true, exitCode }
    })
  }

  /**
   * Send a console command to a running server.
   * @throws `NOT_RUNNING` if the server is not running.
   */
  async sendCommand(id: string, text: string): Promise<void> {
    const live = this.live.get(id)
    if (!live?.handle || live.state !== 'RUNNING' || !live.handle.sendLine(text)) {
      throw new MSMError(ErrorType.NOT_RUNNING, `Server ${id} is not running`, { serverId: id })
    }
    this.logger.debug(`[${id}] > ${text}`)
  }

  /**
   * Remove a server from the registry.
   * @param options.deleteFiles [Optional: default is `false`] Also delete its folder (only inside the servers folder).
   * @throws `BUSY` if the server is running.
   */
  async remove(id: string, options: { deleteFiles?: boolean } = {}): Promise<ServerRecord> {
    return this.locks.run(id, async () => {
      this.assertNotRunning(id)
      const record = await this.store.remove(id)
      if (options.deleteFiles) {
        if (await pathsafety.isWithin(record.path, this.serversRoot)) await pathsafety.removePath(record.path)
        else this.logger.warn(`Not deleting ${record.path}: outside ${this.serversRoot}`)
      }
      this.live.delete(id)
      this.listeners.delete(id)
      this.logger.info(`Server ${record.name} removed`)
      return record
    })
  }

  /**
   * Update the settings of a server. The port is written to `server.properties`; Java and memory
   * settings to the generated launch script (or `user_jvm_args.txt` for Forge).
   * @throws `BUSY` if the folder is changed while the server is running.
   */
  async update(id: string, patch: ServerPatch): Promise<ServerRecord> {
    return this.locks.run(id, async () => {
      const current = await this.requireRecord(id)
      if (patch.path !== undefined && patch.path !== current.path) this.assertNotRunning(id)

      const record = await this.store.update(id, patch)
      if (patch.port !== undefined && patch.port !== null && patch.port !== current.port) {
        const file = path_.join(record.path, 'server.properties')
        const props = await properties.read(file)
        await properties.write(file, { ...props, 'server-port': String(patch.port) })
      }
      if (patch.javaPath !== undefined || patch.memoryMaxMb !== undefined || patch.memoryMinMb !== undefined) {
        await this.writeLaunchFiles(record, false)
      }
      return record
    })
  }

  /**
   * Copy the world of a server into `<backupPath>/world`, replacing the previous backup only once
   * the copy is complete.
   * @returns The backup folder.
   * @throws `CONFIG_ERROR` if no backup folder is set, `NOT_FOUND` if the world does not exist.
   */
  async backup(id: string): Promise<string> {
    return this.locks.run(`backup:${id}`, async () => {
      const record = await this.requireRecord(id)
      if (!record.backupPath) throw new MSMError(ErrorType.CONFIG_ERROR, `No backup folder set for ${record.name}`, { serverId: id })

      const levelName = (await properties.read(path_.join(record.path, 'server.properties')))['level-name'] || 'world'
      const world = path_.join(record.path, levelName)
      if (!(await pathsafety.exists(world))) throw new MSMError(ErrorType.NOT_FOUND, `World ${world} not found`, { path: world, serverId: id })

      const target = path_.join(record.backupPath, 'world')
      const stamp = utils.fileTimestamp()
      const staging = path_.join(record.backupPath, `.world.${stamp}.staging`)
      const previous = path_.join(record.backupPath, `.world.${stamp}.old`)
      try {
        await fs.mkdir(record.backupPath, { recursive: true })
        await pathsafety.copyDir(world, staging)
        if (await pathsafety.exists(target)) await fs.rename(target, previous)
        await fs.rename(staging, target)
        await pathsafety.removePath(previous)
      } catch (err) {
        await pathsafety.removePath(staging)
        if (!(await pathsafety.exists(target)) && (await pathsafety.exists(previous))) await fs.rename(previous, target)
        const error = err instanceof MSMError ? err : new MSMError(ErrorType.FILE_ERROR, `Backup of ${record.name} failed: ${errorMessage(err)}`)
        this.logger.error(error.message)
        throw error
      }

      this.logger.info(`World of ${record.name} backed up to ${target}`)
      return target
    })
  }

  /**
   * Every server of the registry, with its live state.
   */
  async list(): Promise<ServerSnapshot[]> {
    const registry = await this.store.list()
    return registry.map((record) => ({ ...record, state: this.getState(record.id), instance: this.getInstance(record.id) }))
  }

  getState(id: string): ServerState {
    return this.live.get(id)?.state ?? 'CONFIGURED'
  }

  getInstance(id: string): RunningInstance | null {
    return this.live.get(id)?.instance ?? null
  }

  /**
   * Take the output lines queued since the last call.
   */
  drainOutput(id: string): string[] {
    return this.live.get(id)?.handle?.drain() ?? []
  }

  /**
   * Receive the events (state changes, output lines, samples, errors) of a server.
   * @returns A function that removes the listener.
   */
  subscribe(id: string, listener: ServerListener): () => void {
    const set = this.listeners.get(id) ?? new Set<ServerListener>()
    set.add(listener)
    this.listeners.set(id, set)
    return () => {
      set.delete(listener)
      if (set.size === 0 && this.listeners.get(id) === set) this.listeners.delete(id)
    }
  }

  /**
   * Stop every running server and flush the registry.
   */
  async shutdown() {
    const running = [...this.live.entries()].filter(([, live]) => live.instance).map(([id]) => id)
    const results = await Promise.allSettled(running.map((id) => this.stop(id)))
    results.forEach((result, i) => {
      if (result.status === 'rejected') this.logger.error(`Cannot stop ${running[i]} on shutdown: ${errorMessage(result.reason)}`)
    })
    await this.store.flush()
  }

  private async install(record: ServerRecord, loaderVersion: string | null, options: ExecuteOptions): Promise<ServerRecord> {
    const plan = await this.installer.resolveInstall(record, loaderVersion, options)
    const result = await this.installer.execute(plan, options)
    if (result.status === 'FAILED') {
      throw new MSMError(result.code, result.message, { stage: result.stage, exitCode: result.exitCode, serverId: record.id })
    }
    return { ...record, loaderVersion: plan.loaderVersion, javaPath: record.javaPath ?? result.javaPath }
  }

  /**
   * Write the launch script (unless the installer provided one), or the JVM arguments of Forge.
   */
  private async writeLaunchFiles(record: ServerRecord, create: boolean = true) {
    if (await pathsafety.exists(path_.join(record.path, FORGE_ARGS_FILE))) {
      await writeForgeJvmArgs(record.path, record.memoryMaxMb, record.memoryMinMb)
      return
    }

    const generated = path_.join(record.path, LAUNCH_SCRIPT_NAMES[0] + scriptExtension())
    const existing = await findLaunchScript(record.path)
    if (existing ? existing !== generated : !create) return

    const jar = await findServerJar(record.path, record.loaderKind)
    if (!jar) {
      if (create) this.logger.warn(`No server jar found in ${record.path}, launch script not written`)
      return
    }
    await writeLaunchScript(record.path, { jar, javaPath: record.javaPath, memoryMaxMb: record.memoryMaxMb, memoryMinMb: record.memoryMinMb })
  }

  private async writeEula(dir: string) {
    await pathsafety.atomicWriteFile(
      path_.join(dir, 'eula.txt'),
      `#By changing the setting below to TRUE you are indicating your agreement to our EULA (https://aka.ms/MinecraftEULA).\n#${new Date().toString()}\neula=true\n`
    )
  }

  /**
   * Checks before a start.
   * @returns The launch script.
   */
  private async prepareStart(record: ServerRecord) {
    if (!(await pathsafety.exists(record.path))) {
      throw new MSMError(ErrorType.NOT_FOUND, `Server folder ${record.path} not found`, { path: record.path, serverId: record.id })
    }

    if (!(await isEulaAccepted(record.path))) {
      if (!record.eulaAccepted) throw new MSMError(ErrorType.CONFIG_ERROR, `The EULA of ${record.name} is not accepted`, { serverId: record.id })
      await this.writeEula(record.path)
    }

    const props = await properties.read(path_.join(record.path, 'server.properties'))
    const port = record.port ?? (parseInt(props['server-port'] ?? '', 10) || DEFAULT_PORT)
    if (!(await isPortFree(port))) throw new MSMError(ErrorType.BUSY, `Port ${port} is already in use`, { serverId: record.id })

    await this.writeLaunchFiles(record)
    const script = await findLaunchScript(record.path)
    if (!script) throw new MSMError(ErrorType.NOT_FOUND, `No launch script found in ${record.path}`, { path: record.path, serverId: record.id })
    return script
  }

  private environment(record: ServerRecord): NodeJS.ProcessEnv {
    if (!record.javaPath) return process.env
    const javaBin = path_.dirname(record.javaPath)
    const key = Object.keys(process.env).find((k) => k.toUpperCase() === 'PATH') ?? 'PATH'
    return { ...process.env, [key]: [javaBin, process.env[key] ?? ''].join(path_.delimiter) }
  }

  private async onExit(id: string, handle: ProcessHandle, code: number | null) {
    const live = this.live.get(id)
    if (!live || live.handle !== handle) return

    if (live.timer) clearInterval(live.timer)
    live.timer = null
    live.handle = null
    live.instance = null

    if (live.stopRequested) {
      this.logger.info(`Server ${id} stopped (exit code ${code})`)
    } else {
      const lastLines = handle.lastLines()
      this.logger.error(`Server ${id} exited unexpectedly (exit code ${code}). Last output:\n${lastLines.join('\n')}`)
      this.setState(id, 'CRASH_EXITED', code)
      this.dispatch({ type: 'error', id, code: ErrorType.PROCESS_ERROR, message: `Server exited unexpectedly with code ${code}` })
    }
    live.stopRequested = false
    this.setState(id, 'CONFIGURED', code)
    await this.persistState(id, 'CONFIGURED')
  }

  private startSampling(id: string, handle: ProcessHandle) {
    let busy = false
    const timer = setInterval(() => {
      if (busy || !handle.running) return
      busy = true
      this.sampler
        .sample(handle.pid)
        .then((sample) => this.onSample(id, handle, sample))
        .catch((err) => this.logger.debug(`Sampling of ${id} failed: ${errorMessage(err)}`))
        .finally(() => (busy = false))
    }, this.pollInterval)
    timer.unref()
    return timer
  }

  private onSample(id: string, handle: ProcessHandle, sample: ResourceSample | null) {
    const live = this.live.get(id)
    if (!sample || !live?.instance || live.handle !== handle) return
    live.instance.lastSample = sample
    this.dispatch({ type: 'sample', id, sample })
  }

  private setState(id: string, state: ServerState, exitCode?: number | null) {
    const live = this.getLive(id)
    const from = live.state
    if (from === state) return
    live.state = state
    this.emit('server_state', { id, from, to: state, exitCode })
    this.emit('server_debug', `[${id}] ${from} -> ${state}`)
    this.dispatch({ type: 'state', id, from, to: state, exitCode })
  }

  private async persistState(id: string, state: ServerState) {
    try {
      await this.store.update(id, { lastState: state })
    } catch (err) {
      this.logger.warn(`Cannot save the state of ${id}: ${errorMessage(err)}`)
    }
  }

  private dispatch(event: ServerEvent) {
    for (const listener of this.listeners.get(event.id) ?? []) {
      try {
        listener(event)
      } catch (err) {
        this.logger.error(`Listener of ${event.id} failed: ${errorMessage(err)}`)
      }
    }
  }

  private getLive(id: string): LiveServer {
    let live = this.live.get(id)
    if (!live) {
      live = { state: 'CONFIGURED', handle: null, instance: null, stopRequested: false, exited: null, timer: null }
      this.live.set(id, live)
    }
    return live
  }

  private assertNotRunning(id: string) {
    if (this.live.get(id)?.handle) throw new MSMError(ErrorType.BUSY, `Server ${id} is running`, { serverId: id })
  }

  private async requireRecord(id: string) {
    const record = await this.store.get(id)
    if (!record) throw new MSMError(ErrorType.NOT_FOUND, `Server ${id} not found`, { serverId: id })
    return record
  }
}
