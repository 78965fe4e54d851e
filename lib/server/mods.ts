/**
 * @license MIT
 * @copyright Copyright (c) 2026, GoldFrite
 */

import AdmZip from 'adm-zip'
import fs from 'node:fs/promises'
import path_ from 'node:path'
import type { ModInfo, ModListFormat } from '../../types/mod'
import { MSMError, ErrorType, errorMessage } from '../../types/errors'
import pathsafety from '../utils/pathsafety'
import utils from '../utils/utils'
import { getLogger } from '../utils/logger'

const logger = getLogger('Mods')

const ENABLED = '.jar'
const DISABLED = '.jar.disabled'
const PLACEHOLDER_AUTHORS = ['unknown', 'author', 'example author', 'example']

type Metadata = Pick<ModInfo, 'name' | 'version' | 'loader' | 'modId' | 'gameVersion' | 'authors' | 'description'>
type StringField = 'name' | 'version' | 'modId' | 'gameVersion' | 'description'

const STRING_FIELDS: StringField[] = ['name', 'version', 'modId', 'gameVersion', 'description']

/**
 * Mods of a server: the `.jar` and `.jar.disabled` files of its `mods` folder, sorted by file name.
 * @param options.includeDisabled [Optional: default is `true`]
 */
async function list(serverDir: string, options: { includeDisabled?: boolean } = {}): Promise<ModInfo[]> {
  const dir = path_.join(serverDir, 'mods')
  let entries: string[]
  try {
    entries = (await fs.readdir(dir, { withFileTypes: true })).filter((e) => e.isFile()).map((e) => e.name)
  } catch (err) {
    if (!(await pathsafety.exists(dir))) return []
    throw new MSMError(ErrorType.FILE_ERROR, `Cannot read ${dir}: ${errorMessage(err)}`, { path: dir })
  }

  const mods: ModInfo[] = []
  for (const file of entries.sort()) {
    const id = modId(file)
    if (id === null) continue
    const enabled = file.endsWith(ENABLED)
    if (!enabled && options.includeDisabled === false) continue

    const full = path_.join(dir, file)
    const { size } = await fs.stat(full)
    mods.push({ id, file, enabled, size, ...readMetadata(full, id) })
  }
  return mods
}

/**
 * Enable a mod: `<id>.jar.disabled` is renamed to `<id>.jar`. When both files exist, the disabled
 * copy is removed if it has the same size, else kept as `<id>.disabled.bak`.
 * @returns The enabled file.
 * @throws `NOT_FOUND` if the mod does not exist.
 */
async function enable(serverDir: string, id: string): Promise<string> {
  return await toggle(serverDir, id, true)
}

/**
 * Disable a mod: `<id>.jar` is renamed to `<id>.jar.disabled`. When both files exist, the enabled
 * copy is removed if it has the same size, else kept as `<id>.enabled.bak`.
 * @returns The disabled file.
 * @throws `NOT_FOUND` if the mod does not exist.
 */
async function disable(serverDir: string, id: string): Promise<string> {
  return await toggle(serverDir, id, false)
}

/**
 * Render a list of mods, as text (one line per mod) or JSON.
 */
function exportList(mods: ModInfo[], format: ModListFormat = 'text'): string {
  if (format === 'json') {
    const data = mods.map((m) => ({ id: m.id, name: m.name, version: m.version, enabled: m.enabled, authors: m.authors, file: m.file }))
    return JSON.stringify(data, null, 2)
  }
  return mods
    .map((m) => {
      const version = m.version ? ` (${m.version})` : ''
      const authors = m.authors.length > 0 ? ` - by ${m.authors.join(', ')}` : ''
      return `[${m.enabled ? 'x' : ' '}] ${m.name}${version}${authors}`
    })
    .join('\n')
}

async function toggle(serverDir: string, id: string, enabled: boolean): Promise<string> {
  const dir = path_.join(serverDir, 'mods')
  const target = path_.join(dir, id + (enabled ? ENABLED : DISABLED))
  const other = path_.join(dir, id + (enabled ? DISABLED : ENABLED))
  if (!id || modId(path_.basename(target)) !== id || !(await pathsafety.isWithin(target, dir))) {
    throw new MSMError(ErrorType.PATH_TRAVERSAL, `Invalid mod "${id}"`, { path: target })
  }

  const [hasTarget, hasOther] = await Promise.all([pathsafety.exists(target), pathsafety.exists(other)])
  if (!hasOther) {
    if (hasTarget) return target
    throw new MSMError(ErrorType.NOT_FOUND, `Mod ${id} not found in ${dir}`, { path: dir })
  }

  if (!hasTarget) {
    await fs.rename(other, target)
  } else if ((await fs.stat(target)).size === (await fs.stat(other)).size) {
    await fs.rm(other, { force: true })
  } else {
    const backup = await freeName(path_.join(dir, `${id}.${enabled ? 'disabled' : 'enabled'}`), '.bak')
    logger.warn(`Both ${path_.basename(target)} and ${path_.basename(other)} exist, moving the latter to ${path_.basename(backup)}`)
    await fs.rename(other, backup)
  }
  logger.info(`Mod ${id} ${enabled ? 'enabled' : 'disabled'}`)
  return target
}

async function freeName(base: string, extension: string) {
  if (!(await pathsafety.exists(base + extension))) return base + extension
  return `${base}.${Date.now()}${extension}`
}

function modId(file: string): string | null {
  if (file.endsWith(DISABLED)) return file.slice(0, -DISABLED.length) || null
  if (file.endsWith(ENABLED)) return file.slice(0, -ENABLED.length) || null
  return null
}

/**
 * Metadata of a mod jar, from `fabric.mod.json`, `META-INF/mods.toml` or `mcmod.info` (first found).
 */
function readMetadata(file: string, id: string): Metadata {
  const fallback: Metadata = { name: id, version: null, loader: 'unknown', modId: null, gameVersion: null, authors: [], description: '' }
  let zip: AdmZip
  try {
    zip = new AdmZip(file)
  } catch (err) {
    logger.warn(`Cannot open ${file}: ${errorMessage(err)}`)
    return fallback
  }

  const text = (name: string) => zip.getEntry(name)?.getData().toString('utf-8') ?? null
  try {
    const fabric = text('fabric.mod.json')
    if (fabric !== null) return { ...fallback, ...fabricMetadata(JSON.parse(fabric)) }
    const forge = text('META-INF/mods.toml')
    if (forge !== null) return { ...fallback, ...forgeMetadata(forge, text('META-INF/MANIFEST.MF')) }
    const legacy = text('mcmod.info')
    if (legacy !== null) return { ...fallback, ...legacyMetadata(JSON.parse(legacy)) }
  } catch (err) {
    logger.warn(`Invalid metadata in ${file}: ${errorMessage(err)}`)
  }
  return fallback
}

function fabricMetadata(meta: unknown): Partial<Metadata> {
  if (!utils.isRecord(meta)) return { loader: 'fabric' }
  const depends = utils.isRecord(meta.depends) ? meta.depends.minecraft : undefined
  const minecraft: unknown = Array.isArray(depends) ? depends[0] : depends
  return {
    loader: 'fabric',
    ...pickStrings(meta, { modId: 'id', name: 'name', version: 'version', description: 'description' }),
    authors: authorList(meta.authors),
    gameVersion: typeof minecraft === 'string' ? minecraft : null
  }
}

function legacyMetadata(info: unknown): Partial<Metadata> {
  const meta: unknown = Array.isArray(info) ? info[0] : info
  if (!utils.isRecord(meta)) return { loader: 'forge' }
  return {
    loader: 'forge',
    ...pickStrings(meta, { modId: 'modid', name: 'name', version: 'version', description: 'description', gameVersion: 'mcversion' }),
    authors: authorList(meta.authorList ?? meta.authors ?? meta.author)
  }
}

/**
 * Read the first `[[mods]]` table of a `mods.toml` and the `minecraft` dependency range. Only
 * string values are read.
 */
function forgeMetadata(toml: string, manifest: string | null): Partial<Metadata> {
  const tables = toml.split(/^\s*\[\[/m)
  const mod = tables.find((t) => /^mods\]\]/.test(t)) ?? ''
  const minecraft = tables.find((t) => /^dependencies\.[^\]]+\]\]/.test(t) && tomlValue(t, 'modId') === 'minecraft')

  let version = tomlValue(mod, 'version')
  if (version === '${file.jarVersion}') version = manifestVersion(manifest) ?? version
  const authors = tomlValue(mod, 'authors') ?? tomlValue(tables[0], 'authors')

  const result: Partial<Metadata> = { loader: 'forge', version, authors: authors ? authorList(authors.split(',')) : [] }
  const modId = tomlValue(mod, 'modId')
  const name = tomlValue(mod, 'displayName')
  const description = tomlValue(mod, 'description')
  const range = minecraft ? tomlValue(minecraft, 'versionRange') : null
  if (modId) result.modId = modId
  if (name) result.name = name
  if (description) result.description = description
  if (range) result.gameVersion = range
  return result
}

function tomlValue(table: string, key: string): string | null {
  const match = table.match(new RegExp(`^\\s*${key}\\s*=\\s*(?:"""([\\s\\S]*?)"""|'''([\\s\\S]*?)'''|"([^"\\n]*)"|'([^'\\n]*)')`, 'm'))
  if (!match) return null
  const value = match[1] ?? match[2] ?? match[3] ?? match[4]
  return value === undefined ? null : value.trim()
}

function manifestVersion(manifest: string | null): string | null {
  const match = manifest?.match(/^Implementation-Version:\s*(\S+)/m)
  return match && match[1] !== '${projectversion}' ? match[1] : null
}

function pickStrings(meta: Record<string, unknown>, keys: Partial<Record<StringField, string>>): Partial<Record<StringField, string>> {
  const result: Partial<Record<StringField, string>> = {}
  for (const field of STRING_FIELDS) {
    const key = keys[field]
    const value = key ? meta[key] : undefined
    if (typeof value === 'string' && value.trim()) result[field] = value.trim()
  }
  return result
}

function authorList(value: unknown): string[] {
  const items: unknown[] = Array.isArray(value) ? value : [value]
  return items
    .map((a) => (typeof a === 'string' ? a : utils.isRecord(a) && typeof a.name === 'string' ? a.name : ''))
    .map((a) => a.trim())
    .filter((a) => a && !PLACEHOLDER_AUTHORS.includes(a.toLowerCase()))
}

export default { list, enable, disable, exportList, readMetadata }
