/**
 * @license MIT
 * @copyright Copyright (c) 2026, GoldFrite
 */

import fs from 'node:fs/promises'
import { MSMError, ErrorType, errorMessage } from '../../types/errors'
import pathsafety from '../utils/pathsafety'
import utils from '../utils/utils'
import defaults from './defaultproperties.json'
import rulesData from './propertyrules.json'

export type Properties = Record<string, string>

type Rule = { type: 'int'; min?: number; max?: number } | { type: 'bool' } | { type: 'enum'; values: string[] }

const RULES = loadRules(rulesData)

function loadRules(data: unknown) {
  const rules = new Map<string, Rule>()
  if (!utils.isRecord(data)) return rules
  for (const [name, rule] of Object.entries(data)) {
    if (!utils.isRecord(rule)) continue
    if (rule.type === 'int') {
      rules.set(name, {
        type: 'int',
        min: typeof rule.min === 'number' ? rule.min : undefined,
        max: typeof rule.max === 'number' ? rule.max : undefined
      })
    } else if (rule.type === 'bool') {
      rules.set(name, { type: 'bool' })
    } else if (rule.type === 'enum' && Array.isArray(rule.values)) {
      rules.set(name, { type: 'enum', values: rule.values.filter((v): v is string => typeof v === 'string') })
    }
  }
  return rules
}

const ESCAPES: Record<string, string> = { t: '\t', n: '\n', r: '\r', f: '\f' }

function unescape(text: string) {
  return text.replace(/\\(u[0-9a-fA-F]{4}|.)/g, (_, seq: string) => {
    if (seq.length === 5) return String.fromCharCode(parseInt(seq.slice(1), 16))
    return ESCAPES[seq] ?? seq
  })
}

/**
 * Join continued lines (ending with an odd number of backslashes) into logical lines.
 */
function logicalLines(text: string) {
  const lines: string[] = []
  let current: string | null = null
  for (const raw of text.split(/\r\n|\r|\n/)) {
    const line: string = current === null ? raw.replace(/^[ \t\f]+/, '') : current + raw.replace(/^[ \t\f]+/, '')
    const trailing = line.match(/\\+$/)?.[0].length ?? 0
    if (trailing % 2 === 1) {
      current = line.slice(0, -1)
      continue
    }
    current = null
    lines.push(line)
  }
  if (current !== null) lines.push(current)
  return lines
}

/**
 * Parse a `.properties` document (Java properties format).
 */
function parse(text: string): Properties {
  const props: Properties = {}
  for (const line of logicalLines(text)) {
    if (!line || line.startsWith('#') || line.startsWith('!')) continue

    let i = 0
    while (i < line.length && !/[=: \t\f]/.test(line[i])) i += line[i] === '\\' ? 2 : 1
    const key = unescape(line.slice(0, i))

    let rest = line.slice(i).replace(/^[ \t\f]+/, '')
    if (rest.startsWith('=') || rest.startsWith(':')) rest = rest.slice(1).replace(/^[ \t\f]+/, '')
    props[key] = unescape(rest)
  }
  return props
}

function escape(text: string, isKey: boolean) {
  let out = ''
  for (let i = 0; i < text.length; i++) {
    const ch = text[i]
    switch (ch) {
      case '\\':
        out += '\\\\'
        break
      case '\t':
        out += '\\t'
        break
      case '\n':
        out += '\\n'
        break
      case '\r':
        out += '\\r'
        break
      case '\f':
        out += '\\f'
        break
      case ':':
      case '=':
        out += '\\' + ch
        break
      case ' ':
        out += i === 0 || isKey ? '\\ ' : ' '
        break
      case '#':
      case '!':
        out += i === 0 && isKey ? '\\' + ch : ch
        break
      default:
        out += ch
    }
  }
  return out
}

/**
 * Serialize properties, one `key=value` line each, in insertion order.
 */
function stringify(props: Properties, comments: string[] = ['Minecraft server properties']): string {
  const lines = comments.map((c) => `#${c}`)
  for (const [key, value] of Object.entries(props)) lines.push(`${escape(key, true)}=${escape(value, false)}`)
  return lines.join('\n') + '\n'
}

/**
 * Read a `server.properties` file.
 * @returns The properties, `{}` if the file does not exist.
 */
async function read(file: string): Promise<Properties> {
  let text: string
  try {
    text = await fs.readFile(file, 'utf-8')
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return {}
    throw new MSMError(ErrorType.FILE_ERROR, `Cannot read ${file}: ${errorMessage(err)}`, { path: file })
  }
  return parse(text)
}

/**
 * Write a `server.properties` file atomically.
 */
async function write(file: string, props: Properties) {
  await pathsafety.atomicWriteFile(file, stringify(props, ['Minecraft server properties', new Date().toString()]))
}

/**
 * Default properties of a new server, with `overrides` applied.
 */
function withDefaults(overrides: Properties = {}): Properties {
  const props: Properties = {}
  for (const [key, value] of Object.entries(defaults)) props[key] = String(value)
  return { ...props, ...overrides }
}

/**
 * Check a property against the known rules. Unknown properties and empty values are accepted.
 * @returns The error message, `null` if the value is valid.
 */
function validate(name: string, value: string): string | null {
  const rule = RULES.get(name)
  if (!rule || value === '') return null

  switch (rule.type) {
    case 'int': {
      if (!/^-?\d+$/.test(value.trim())) return `${name}: invalid integer (${value})`
      const n = parseInt(value, 10)
      if (rule.min !== undefined && n < rule.min) return `${name}: must be at least ${rule.min} (${n})`
      if (rule.max !== undefined && n > rule.max) return `${name}: must be at most ${rule.max} (${n})`
      return null
    }
    case 'bool':
      return ['true', 'false'].includes(value.toLowerCase()) ? null : `${name}: must be true or false (${value})`
    case 'enum':
      return rule.values.includes(value) ? null : `${name}: must be one of ${rule.values.join(', ')} (${value})`
  }
}

/**
 * @returns Every validation error of `props`.
 */
function validateAll(props: Properties): string[] {
  return Object.entries(props).flatMap(([name, value]) => validate(name, value) ?? [])
}

export default { parse, stringify, read, write, withDefaults, validate, validateAll }
