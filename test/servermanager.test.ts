import AdmZip from 'adm-zip'
import fs from 'node:fs/promises'
import net from 'node:net'
import path_ from 'node:path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import ServerManager, { type ServerInstaller } from '../lib/server/servermanager'
import ConfigStore from '../lib/config/configstore'
import ProcessRunner, { ProcessHandle } from '../lib/process/processrunner'
import properties from '../lib/server/properties'
import pathsafety from '../lib/utils/pathsafety'
import { MSMError, ErrorType } from '../types/errors'
import type { ResourceSample, ServerRecord, ServerState } from '../types/server'
import { freePort, serverRecord, tmpdir } from './helpers'

// A server console: announces itself, echoes commands, exits on "stop".
const CONSOLE = `
process.stdout.write('Done (0.5s)! For help, type "help"\\n')
let buffer = ''
process.stdin.on('data', (chunk) => {
  buffer += chunk
  let i
  while ((i = buffer.indexOf('\\n')) >= 0) {
    const line = buffer.slice(0, i).trim()
    buffer = buffer.slice(i + 1)
    if (line === 'stop') process.exit(0)
    process.stdout.write('> ' + line + '\\n')
  }
})
`

const SAMPLE: ResourceSample = { at: 1000, cpuPercent: 5, memoryMb: 512 }

let root: string
let serversRoot: string
let store: ConfigStore
let runner: ProcessRunner
let manager: ServerManager

function installer(): ServerInstaller {
  return {
    resolveInstall: async (record, loaderVersion) => ({
      record,
      kind: record.loaderKind,
      gameVersion: record.gameVersion,
      loaderVersion: record.loaderKind === 'vanilla' ? null : (loaderVersion ?? '0.16.10'),
      javaMajor: 21,
      javaPath: record.javaPath,
      installerUrl: null,
      serverJarUrl: 'https://files.example.test/server.jar',
      serverJarSha1: null,
      targetDir: record.path,
      expectedArtifacts: ['server.jar'],
      expectedLaunchScripts: []
    }),
    execute: async (plan) => {
      await fs.writeFile(path_.join(plan.targetDir, 'server.jar'), 'jar')
      return { status: 'COMPLETE', plan, javaPath: '/opt/jdk-21/bin/java', artifact: 'server.jar', launchScript: null }
    }
  }
}

beforeEach(async () => {
  root = await tmpdir()
  serversRoot = path_.join(root, 'servers')
  await fs.mkdir(serversRoot)
  store = new ConfigStore(path_.join(serversRoot, 'servers_config.json'))
  runner = new ProcessRunner()
  manager = new ServerManager({
    serversRoot,
    store,
    runner,
    installer: installer(),
    sampler: { sample: async () => SAMPLE },
    stopTimeout: 5000,
    pollInterval: 50
  })
})

afterEach(async () => {
  await manager.shutdown()
  await fs.rm(root, { recursive: true, force: true })
})

/**
 * A registered server whose `run.sh` starts the fake console.
 */
async function consoleServer(fields: Partial<ServerRecord> = {}) {
  const dir = path_.join(serversRoot, 'survival')
  await fs.mkdir(dir, { recursive: true })
  await fs.writeFile(path_.join(dir, 'console.js'), CONSOLE)
  await fs.writeFile(path_.join(dir, 'run.sh'), `#!/bin/sh\nexec "${process.execPath}" console.js\n`)
  return await store.add(serverRecord({ id: 'srv-1', path: dir, port: await freePort(), ...fields }))
}

function watch(id: string) {
  const states: ServerState[] = []
  const logs: string[] = []
  manager.subscribe(id, (event) => {
    if (event.type === 'state') states.push(event.to)
    if (event.type === 'log') logs.push(event.line)
  })
  return { states, logs }
}

describe('create', () => {
  it('prepares the folder, installs and registers the server', async () => {
    const record = await manager.create({ name: 'survival', loaderKind: 'vanilla', gameVersion: '1.21.1', port: 25570, memoryMaxMb: 4096 })
    const dir = path_.join(serversRoot, 'survival')

    expect(record).toMatchObject({
      name: 'survival',
      path: dir,
      loaderKind: 'vanilla',
      loaderVersion: null,
      port: 25570,
      javaPath: '/opt/jdk-21/bin/java',
      memoryMaxMb: 4096,
      memoryMinMb: null,
      eulaAccepted: true,
      lastState: 'CONFIGURED'
    })
    expect(await store.get(record.id)).toEqual(record)
    expect(await fs.readFile(path_.join(dir, 'eula.txt'), 'utf-8')).toMatch(/\neula=true\n$/)
    expect(await pathsafety.exists(path_.join(dir, 'world'))).toBe(true)

    const props = await properties.read(path_.join(dir, 'server.properties'))
    expect(props['server-port']).toBe('25570')
    expect(props['motd']).toBe('survival')

    const script = await fs.readFile(path_.join(dir, `start_server${process.platform === 'win32' ? '.bat' : '.sh'}`), 'utf-8')
    expect(script).toContain('-Xmx4096M -jar server.jar nogui')
  })

  it('only prepares the folder without installation', async () => {
    const spy = vi.fn()
    manager = new ServerManager({ serversRoot, store, runner, installer: { ...installer(), resolveInstall: spy } })

    const record = await manager.create({ name: 'bare', loaderKind: 'vanilla', gameVersion: '1.21.1' }, { install: false })
    expect(spy).not.toHaveBeenCalled()
    expect(record).toMatchObject({ port: 25565, javaPath: null, memoryMaxMb: 2048 })
    expect((await fs.readdir(record.path)).sort()).toEqual(['eula.txt', 'logs', 'server.properties', 'world'])
  })

  it('rejects names that are not a single folder', async () => {
    for (const name of ['', '..', '../escape', 'a/b']) {
      await expect(manager.create({ name, loaderKind: 'vanilla', gameVersion: '1.21.1' })).rejects.toMatchObject({ code: 'CONFIG_ERROR' })
    }
  })

  it.skipIf(process.platform === 'win32')('rejects a folder linked outside the servers folder', async () => {
    await fs.mkdir(path_.join(root, 'outside'))
    await fs.symlink(path_.join(root, 'outside'), path_.join(serversRoot, 'linked'))

    await expect(manager.create({ name: 'linked', loaderKind: 'vanilla', gameVersion: '1.21.1' })).rejects.toMatchObject({ code: 'PATH_TRAVERSAL' })
    expect(await fs.readdir(path_.join(root, 'outside'))).toEqual([])
  })

  it('rejects a folder that is not empty', async () => {
    await fs.mkdir(path_.join(serversRoot, 'taken'))
    await fs.writeFile(path_.join(serversRoot, 'taken', 'notes.txt'), 'keep')

    await expect(manager.create({ name: 'taken', loaderKind: 'vanilla', gameVersion: '1.21.1' })).rejects.toMatchObject({ code: 'CONFLICT' })
    expect(await fs.readFile(path_.join(serversRoot, 'taken', 'notes.txt'), 'utf-8')).toBe('keep')
  })

  it('creates a server once when created concurrently under the same name', async () => {
    const results = await Promise.allSettled([
      manager.create({ name: 'survival', loaderKind: 'vanilla', gameVersion: '1.21.1' }),
      manager.create({ name: 'survival', loaderKind: 'vanilla', gameVersion: '1.21.1' })
    ])

    expect(results.map((r) => r.status).sort()).toEqual(['fulfilled', 'rejected'])
    const rejected = results.find((r) => r.status === 'rejected')
    expect(rejected?.status === 'rejected' ? rejected.reason : null).toMatchObject({ code: 'CONFLICT' })
    expect(await store.list()).toHaveLength(1)
    expect(await pathsafety.exists(path_.join(serversRoot, 'survival', 'server.jar'))).toBe(true)
    expect(await pathsafety.exists(path_.join(serversRoot, 'survival', 'server.properties'))).toBe(true)
  })

  it('rejects a folder that another server is registered with', async () => {
    const dir = path_.join(serversRoot, 'survival')
    await store.add(serverRecord({ id: 'srv-1', path: dir }))

    await expect(manager.create({ name: 'survival', loaderKind: 'vanilla', gameVersion: '1.21.1' })).rejects.toMatchObject({
      code: 'CONFLICT',
      details: { serverId: 'srv-1' }
    })
    expect(await store.list()).toHaveLength(1)
    expect(await pathsafety.exists(dir)).toBe(false)
  })

  it('removes the folder when the installation fails', async () => {
    const failing = installer()
    manager = new ServerManager({
      serversRoot,
      store,
      runner,
      installer: {
        ...failing,
        execute: async (plan) => ({ status: 'FAILED', plan, stage: 'DOWNLOADING', code: 'HASH_ERROR', message: 'SHA1 mismatch for server.jar' })
      }
    })

    await expect(manager.create({ name: 'broken', loaderKind: 'vanilla', gameVersion: '1.21.1' })).rejects.toMatchObject({
      code: 'HASH_ERROR',
      message: 'SHA1 mismatch for server.jar'
    })
    expect(await pathsafety.exists(path_.join(serversRoot, 'broken'))).toBe(false)
    expect(await store.list()).toEqual([])
  })
})

describe.skipIf(process.platform === 'win32')('lifecycle', () => {
  it('starts once when started concurrently, then stops with the stop command', async () => {
    const record = await consoleServer()
    const { states, logs } = watch(record.id)
    const spy = vi.spyOn(runner, 'start')

    const [a, b] = await Promise.all([manager.start(record.id), manager.start(record.id)])
    expect(b).toBe(a)
    expect(spy).toHaveBeenCalledTimes(1)
    expect(manager.getState(record.id)).toBe('RUNNING')
    expect((await store.get(record.id))?.lastState).toBe('RUNNING')

    await expect.poll(() => logs).toContain('Done (0.5s)! For help, type "help"')
    await manager.sendCommand(record.id, 'list')
    await expect.poll(() => logs).toContain('> list')

    expect(await manager.stop(record.id)).toEqual({ stopped: true, exitCode: 0 })
    expect(states).toEqual(['STARTING', 'RUNNING', 'STOPPING', 'CONFIGURED'])
    expect(manager.getInstance(record.id)).toBeNull()
    expect((await store.get(record.id))?.lastState).toBe('CONFIGURED')
  })

  it('writes eula.txt when the EULA was accepted', async () => {
    const record = await consoleServer()
    await manager.start(record.id)
    expect(await fs.readFile(path_.join(record.path, 'eula.txt'), 'utf-8')).toMatch(/\neula=true\n$/)
  })

  it('samples the resources of a running server', async () => {
    const record = await consoleServer()
    await manager.start(record.id)
    await expect.poll(() => manager.getInstance(record.id)?.lastSample).toEqual(SAMPLE)
  })

  it('goes through CRASH_EXITED when the process dies', async () => {
    const record = await consoleServer()
    const { states } = watch(record.id)
    const errors: string[] = []
    manager.subscribe(record.id, (event) => {
      if (event.type === 'error') errors.push(event.code)
    })

    const instance = await manager.start(record.id)
    process.kill(instance.pid, 'SIGKILL')

    await expect.poll(() => states).toEqual(['STARTING', 'RUNNING', 'CRASH_EXITED', 'CONFIGURED'])
    expect(errors).toEqual(['PROCESS_ERROR'])
    expect(manager.getInstance(record.id)).toBeNull()
    expect(await manager.stop(record.id)).toEqual({ stopped: false, reason: 'NOT_RUNNING' })
  })

  it('stays RUNNING and reports an error when the process cannot be stopped', async () => {
    const record = await consoleServer()
    const { states } = watch(record.id)
    const errors: string[] = []
    manager.subscribe(record.id, (event) => {
      if (event.type === 'error') errors.push(`${event.code}: ${event.message}`)
    })
    await manager.start(record.id)

    const terminate = vi.spyOn(ProcessHandle.prototype, 'terminate').mockRejectedValueOnce(new MSMError(ErrorType.PROCESS_ERROR, 'kill EPERM'))
    try {
      await expect(manager.stop(record.id)).rejects.toMatchObject({ code: 'PROCESS_ERROR' })
      expect(manager.getState(record.id)).toBe('RUNNING')
      expect(errors).toEqual([`PROCESS_ERROR: Cannot stop server ${record.id}: kill EPERM`])
      expect(states).toEqual(['STARTING', 'RUNNING', 'STOPPING', 'RUNNING'])

      expect(await manager.stop(record.id)).toEqual({ stopped: true, exitCode: 0 })
      expect(manager.getState(record.id)).toBe('CONFIGURED')
    } finally {
      terminate.mockRestore()
    }
  })

  it('refuses to start on a port in use', async () => {
    const record = await consoleServer()
    const blocker = net.createServer()
    await new Promise<void>((resolve) => blocker.listen(record.port ?? 0, resolve))
    try {
      await expect(manager.start(record.id)).rejects.toMatchObject({ code: 'BUSY' })
      expect(manager.getState(record.id)).toBe('CONFIGURED')
    } finally {
      await new Promise((resolve) => blocker.close(resolve))
    }
  })

  it('refuses to start without an accepted EULA', async () => {
    const record = await consoleServer({ eulaAccepted: false })
    await expect(manager.start(record.id)).rejects.toMatchObject({ code: 'CONFIG_ERROR' })
    expect(await pathsafety.exists(path_.join(record.path, 'eula.txt'))).toBe(false)
  })

  it('refuses to remove a running server', async () => {
    const record = await consoleServer()
    await manager.start(record.id)
    await expect(manager.remove(record.id)).rejects.toMatchObject({ code: 'BUSY' })
  })
})

describe('commands', () => {
  it('reports servers that are not running', async () => {
    await expect(manager.sendCommand('srv-1', 'list')).rejects.toMatchObject({ code: 'NOT_RUNNING' })
    expect(await manager.stop('srv-1')).toEqual({ stopped: false, reason: 'NOT_RUNNING' })
    await expect(manager.start('unknown')).rejects.toMatchObject({ code: 'NOT_FOUND' })
  })
})

describe('update', () => {
  it('writes the port to server.properties', async () => {
    const dir = path_.join(serversRoot, 'survival')
    await fs.mkdir(dir)
    await fs.writeFile(path_.join(dir, 'server.properties'), 'server-port=25565\nmotd=hi\n')
    await store.add(serverRecord({ id: 'srv-1', path: dir }))

    expect(await manager.update('srv-1', { port: 25580 })).toMatchObject({ port: 25580 })
    expect(await properties.read(path_.join(dir, 'server.properties'))).toEqual({ 'server-port': '25580', motd: 'hi' })
  })

  it.skipIf(process.platform === 'win32')('rewrites the generated launch script only', async () => {
    const dir = path_.join(serversRoot, 'survival')
    await fs.mkdir(dir)
    await fs.writeFile(path_.join(dir, 'server.jar'), 'jar')
    await fs.writeFile(path_.join(dir, 'start_server.sh'), '#!/bin/sh\n')
    await store.add(serverRecord({ id: 'srv-1', path: dir }))

    await manager.update('srv-1', { memoryMaxMb: 3072 })
    expect(await fs.readFile(path_.join(dir, 'start_server.sh'), 'utf-8')).toContain('exec java -Xmx3072M -jar server.jar nogui\n')

    await fs.rm(path_.join(dir, 'start_server.sh'))
    await fs.writeFile(path_.join(dir, 'run.sh'), '#!/bin/sh\njava -Xmx1G -jar server.jar\n')
    await manager.update('srv-1', { memoryMaxMb: 4096 })
    expect(await fs.readFile(path_.join(dir, 'run.sh'), 'utf-8')).toBe('#!/bin/sh\njava -Xmx1G -jar server.jar\n')
  })
})

describe('remove', () => {
  it('deletes the folder only inside the servers folder', async () => {
    const inside = path_.join(serversRoot, 'survival')
    const outside = path_.join(root, 'elsewhere')
    await fs.mkdir(inside)
    await fs.mkdir(outside)
    await store.add(serverRecord({ id: 'in', path: inside }))
    await store.add(serverRecord({ id: 'out', path: outside }))

    await manager.remove('in', { deleteFiles: true })
    await manager.remove('out', { deleteFiles: true })

    expect(await pathsafety.exists(inside)).toBe(false)
    expect(await pathsafety.exists(outside)).toBe(true)
    expect(await store.list()).toEqual([])
  })
})

describe('backup', () => {
  it('replaces the previous backup of the world', async () => {
    const dir = path_.join(serversRoot, 'survival')
    const backups = path_.join(root, 'backups')
    await fs.mkdir(path_.join(dir, 'world'), { recursive: true })
    await fs.writeFile(path_.join(dir, 'world', 'level.dat'), 'day 1')
    await store.add(serverRecord({ id: 'srv-1', path: dir, backupPath: backups }))

    expect(await manager.backup('srv-1')).toBe(path_.join(backups, 'world'))
    await fs.writeFile(path_.join(dir, 'world', 'level.dat'), 'day 2')
    await manager.backup('srv-1')

    expect(await fs.readdir(backups)).toEqual(['world'])
    expect(await fs.readFile(path_.join(backups, 'world', 'level.dat'), 'utf-8')).toBe('day 2')
  })

  it('uses the level name of server.properties', async () => {
    const dir = path_.join(serversRoot, 'survival')
    const backups = path_.join(root, 'backups')
    await fs.mkdir(path_.join(dir, 'skyblock'), { recursive: true })
    await fs.writeFile(path_.join(dir, 'skyblock', 'level.dat'), 'island')
    await fs.writeFile(path_.join(dir, 'server.properties'), 'level-name=skyblock\n')
    await store.add(serverRecord({ id: 'srv-1', path: dir, backupPath: backups }))

    await manager.backup('srv-1')
    expect(await fs.readFile(path_.join(backups, 'world', 'level.dat'), 'utf-8')).toBe('island')
  })

  it('requires a backup folder and a world', async () => {
    const dir = path_.join(serversRoot, 'survival')
    await fs.mkdir(dir)
    await store.add(serverRecord({ id: 'no-backup', path: dir }))
    await store.add(serverRecord({ id: 'no-world', path: dir, backupPath: path_.join(root, 'backups') }))

    await expect(manager.backup('no-backup')).rejects.toMatchObject({ code: 'CONFIG_ERROR' })
    await expect(manager.backup('no-world')).rejects.toMatchObject({ code: 'NOT_FOUND' })
  })
})

describe('detectExisting', () => {
  it('imports new servers, refreshes known ones and reports conflicts', async () => {
    const jar = new AdmZip()
    jar.addFile('version.json', Buffer.from(JSON.stringify({ id: '1.20.1' })))
    await fs.mkdir(path_.join(serversRoot, 'alpha'))
    await fs.writeFile(path_.join(serversRoot, 'alpha', 'server.jar'), jar.toBuffer())
    await fs.writeFile(path_.join(serversRoot, 'alpha', 'eula.txt'), 'eula=true\n')

    const beta = path_.join(serversRoot, 'beta')
    await fs.mkdir(path_.join(beta, 'libraries', 'net', 'fabricmc', 'fabric-loader', '0.16.9'), { recursive: true })
    await fs.writeFile(path_.join(beta, 'fabric-server-launch.jar'), '')
    const known = await store.add(serverRecord({ id: 'b', path: beta, name: 'Beta World', gameVersion: '1.19.4', port: 25599, memoryMaxMb: 1024 }))

    const gamma = path_.join(serversRoot, 'gamma')
    await fs.mkdir(gamma)
    await fs.writeFile(path_.join(gamma, 'run.sh'), '#!/bin/sh\n')
    await store.add(serverRecord({ id: 'c1', path: gamma }))
    await store.add(serverRecord({ id: 'c2', path: gamma }))

    const gone = await store.add(serverRecord({ id: 'gone', path: path_.join(serversRoot, 'deleted') }))

    await fs.mkdir(path_.join(serversRoot, 'notes'))
    await fs.writeFile(path_.join(serversRoot, 'notes', 'todo.txt'), 'backup')

    const result = await manager.detectExisting()

    expect(result.imported).toHaveLength(1)
    expect(result.imported[0]).toMatchObject({
      name: 'alpha',
      path: path_.join(serversRoot, 'alpha'),
      loaderKind: 'vanilla',
      gameVersion: '1.20.1',
      loaderVersion: null,
      port: null,
      memoryMaxMb: 2048,
      memoryMinMb: null,
      eulaAccepted: true
    })

    const refreshed = { ...known, loaderKind: 'fabric', loaderVersion: '0.16.9', eulaAccepted: false }
    expect(result.updated).toEqual([refreshed])
    expect(await store.get('b')).toEqual(refreshed)

    expect(result.unchanged).toEqual([])
    expect(result.missing).toEqual([gone])
    expect(result.conflicts).toEqual([{ path: gamma, ids: ['c1', 'c2'] }])
    expect(await store.get('c1')).toEqual(serverRecord({ id: 'c1', path: gamma }))
    expect(await store.list()).toHaveLength(5)
  })

  it('leaves unchanged servers alone', async () => {
    const dir = path_.join(serversRoot, 'survival')
    await fs.mkdir(dir)
    await fs.writeFile(path_.join(dir, 'run.sh'), '#!/bin/sh\n')
    const record = await store.add(serverRecord({ id: 'srv-1', path: dir, eulaAccepted: false }))

    const result = await manager.detectExisting()
    expect(result).toEqual({ imported: [], updated: [], unchanged: [record], missing: [], conflicts: [] })
  })
})
