/**
 * @license MIT
 * @copyright Copyright (c) 2026, GoldFrite
 */

import fs from 'node:fs/promises'
import EventEmitter from '../utils/events'
import type { ConfigStoreEvents } from '../../types/events'
import { MSMError, ErrorType, errorMessage } from '../../types/errors'
import { LOADER_KINDS, type LoaderKind, type ServerPatch, type ServerRecord, type ServerRegistry, type ServerState } from '../../types/server'
import pathsafety from '../utils/pathsafety'
import { Mutex } from '../utils/mutex'
import utils from '../utils/utils'
import { getLogger, type Logger } from '../utils/logger'

const STATES: readonly ServerState[] = ['CONFIGURED', 'STARTING', 'RUNNING', 'STOPPING', 'CRASH_EXITED']

/**
 * Persists the server registry to a single JSON document. Every mutation is serialized and
 * rewrites the whole document atomically.
 */
export default class ConfigStore extends EventEmitter<ConfigStoreEvents> {
  readonly file: string
  private readonly lock = new Mutex()
  private readonly logger: Logger

  /**
   * @param file Path to the registry document (`servers_config.json`).
   */
  constructor(file: string, logger: Logger = getLogger('ConfigStore')) {
    super()
    this.file = file
    this.logger = logger
  }

  /**
   * Read the registry from disk. A missing file is an empty registry.
   * @throws `CONFIG_ERROR` if the document is malformed or a record misses a required field.
   */
  async load(): Promise<ServerRegistry> {
    let raw: string
    try {
      raw = await fs.readFile(this.file, 'utf-8')
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return []
      throw new MSMError(ErrorType.FILE_ERROR, `Cannot read ${this.file}: ${errorMessage(err)}`, { path: this.file })
    }

    let data: unknown
    try {
      data = JSON.parse(raw)
    } catch (err) {
      const error = new MSMError(ErrorType.CONFIG_ERROR, `Malformed registry ${this.file}: ${errorMessage(err)}`, { path: this.file })
      this.logger.error(error.message)
      throw error
    }

    try {
      return parseRegistry(data)
    } catch (err) {
      if (err instanceof MSMError) {
        const error = new MSMError(err.code, `Invalid registry ${this.file}: ${err.message}`, { path: this.file })
        this.logger.error(error.message)
        throw error
      }
      throw err
    }
  }

  /**
   * Replace the whole registry.
   */
  save(registry: ServerRegistry): Promise<void> {
    return this.lock.run(() => this.write(registry))
  }

  list(): Promise<ServerRegistry> {
    return this.lock.run(() => this.load())
  }

  async get(id: string): Promise<ServerRecord | null> {
    const registry = await this.list()
    return registry.find((record) => record.id === id) ?? null
  }

  /**
   * Append a record.
   * @throws `CONFLICT` if a record with the same ID exists.
   */
  add(record: ServerRecord): Promise<ServerRecord> {
    return this.transaction((registry) => {
      if (registry.some((r) => r.id === record.id)) {
        throw new MSMError(ErrorType.CONFLICT, `A server with ID ${record.id} already exists`, { serverId: record.id })
      }
      return { registry: [...registry, record], result: record }
    })
  }

  /**
   * Update the fields of a record. The ID cannot be changed.
   * @throws `NOT_FOUND` if the record does not exist.
   */
  update(id: string, patch: ServerPatch): Promise<ServerRecord> {
    return this.transaction((registry) => {
      const index = this.indexOf(registry, id)
      const updated = parseRecord({ ...registry[index], ...patch, id }, index)
      return { registry: registry.map((r, i) => (i === index ? updated : r)), result: updated }
    })
  }

  /**
   * @throws `NOT_FOUND` if the record does not exist.
   */
  remove(id: string): Promise<ServerRecord> {
    return this.transaction((registry) => {
      const index = this.indexOf(registry, id)
      return { registry: registry.filter((_, i) => i !== index), result: registry[index] }
    })
  }

  /**
   * Read-modify-write of the registry, serialized with every other mutation.
   * @param fn Receives the on-disk registry, returns the new one and a result.
   */
  transaction<T>(fn: (registry: ServerRegistry) => { registry: ServerRegistry; result: T } | Promise<{ registry: ServerRegistry; result: T }>): Promise<T> {
    return this.lock.run(async () => {
      const current = await this.load()
      const { registry, result } = await fn(current)
      if (registry !== current) await this.write(registry)
      return result
    })
  }

  /**
   * Wait for the queued writes.
   */
  async flush() {
    await this.lock.idle()
  }

  private async write(registry: ServerRegistry) {
    await pathsafety.atomicWriteFile(this.file, JSON.stringify(registry, null, 2))
    this.logger.debug(`Registry saved (${registry.length} servers)`)
    this.emit('registry_saved', { path: this.file, count: registry.length })
  }

  private indexOf(registry: ServerRegistry, id: string) {
    const index = registry.findIndex((r) => r.id === id)
    if (index === -1) throw new MSMError(ErrorType.NOT_FOUND, `Server ${id} not found`, { serverId: id })
    return index
  }
}

export function parseRegistry(data: unknown): ServerRegistry {
  if (!Array.isArray(data)) throw new MSMError(ErrorType.CONFIG_ERROR, 'the document is not an array')
  const registry = data.map((value: unknown, i) => parseRecord(value, i))
  const ids = new Set<string>()
  for (const record of registry) {
    if (ids.has(record.id)) throw new MSMError(ErrorType.CONFIG_ERROR, `duplicate server ID ${record.id}`)
    ids.add(record.id)
  }
  return registry
}

/**
 * Validate a record of the registry document. `id`, `name`, `path`, `loaderKind` and `gameVersion`
 * are required; other fields get their default value when absent.
 */
export function parseRecord(value: unknown, index: number): ServerRecord {
  const fail = (message: string): never => {
    throw new MSMError(ErrorType.CONFIG_ERROR, `server #${index}: ${message}`)
  }
  if (!utils.isRecord(value)) return fail('not an object')
  const fields = value

  const string = (key: string) => {
    const v = fields[key]
    if (typeof v !== 'string' || v.length === 0) return fail(`missing required field "${key}"`)
    return v
  }
  const optional = <T>(key: string, check: (v: unknown) => v is T, fallback: T): T => {
    const v = fields[key]
    if (v === undefined) return fallback
    return check(v) ? v : fail(`invalid field "${key}"`)
  }
  const isString = (v: unknown): v is string => typeof v === 'string'
  const isNullableString = (v: unknown): v is string | null => v === null || typeof v === 'string'
  const isNullablePort = (v: unknown): v is number | null => v === null || (Number.isInteger(v) && typeof v === 'number' && v > 0 && v < 65536)
  const isNullableMemory = (v: unknown): v is number | null => v === null || (typeof v === 'number' && Number.isInteger(v) && v > 0)
  const isMemory = (v: unknown): v is number => typeof v === 'number' && Number.isInteger(v) && v > 0
  const isState = (v: unknown): v is ServerState => isString(v) && STATES.some((s) => s === v)
  const isBoolean = (v: unknown): v is boolean => typeof v === 'boolean'

  const kind = string('loaderKind')
  const loaderKind = LOADER_KINDS.find((k): k is LoaderKind => k === kind) ?? fail(`unknown loader kind "${kind}"`)

  return {
    id: string('id'),
    name: string('name'),
    path: string('path'),
    loaderKind,
    gameVersion: string('gameVersion'),
    loaderVersion: optional('loaderVersion', isNullableString, null),
    port: optional('port', isNullablePort, null),
    javaPath: optional('javaPath', isNullableString, null),
    backupPath: optional('backupPath', isNullableString, null),
    lastState: optional('lastState', isState, 'CONFIGURED'),
    memoryMaxMb: optional('memoryMaxMb', isMemory, 2048),
    memoryMinMb: optional('memoryMinMb', isNullableMemory, null),
    eulaAccepted: optional('eulaAccepted', isBoolean, false)
  }
}
