import fs from 'node:fs/promises'
import path_ from 'node:path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import LoaderManager from '../lib/loader/loadermanager'
import VersionCatalog, { VERSION_MANIFEST } from '../lib/catalog/versioncatalog'
import { FABRIC_META } from '../lib/catalog/loaders/fabric'
import { FORGE_MAVEN, forgeInstallerUrl } from '../lib/catalog/loaders/forge'
import Java from '../lib/java/java'
import ProcessRunner from '../lib/process/processrunner'
import Downloader from '../lib/utils/downloader'
import pathsafety from '../lib/utils/pathsafety'
import type { InstallStage } from '../types/loader'
import type { JavaProvider } from '../types/java'
import { FakeHttp, serverRecord, sha, tmpdir } from './helpers'

const INSTALLER_URL = 'https://maven.example.test/fabric-installer-1.0.1.jar'
const SERVER_JAR = Buffer.from('vanilla server jar')

let dir: string
let http: FakeHttp
let javaRoot: string

beforeEach(async () => {
  dir = await tmpdir()
  http = new FakeHttp()
  javaRoot = path_.join(dir, 'jdk-21')

  http.json.set(VERSION_MANIFEST, {
    versions: [{ id: '1.21.1', type: 'release', url: 'https://meta.example.test/1.21.1.json', releaseTime: '2024-08-08T12:00:00+00:00' }]
  })
  http.json.set('https://meta.example.test/1.21.1.json', {
    downloads: { server: { url: 'https://files.example.test/1.21.1/server.jar', sha1: sha(SERVER_JAR, 'sha1') } },
    javaVersion: { majorVersion: 21 }
  })
  http.files.set('https://files.example.test/1.21.1/server.jar', SERVER_JAR)

  http.json.set(`${FABRIC_META}/loader`, [
    { version: '0.16.10', stable: true },
    { version: '0.16.9', stable: true }
  ])
  http.json.set(`${FABRIC_META}/installer`, [{ url: INSTALLER_URL, version: '1.0.1', stable: true }])
  http.files.set(INSTALLER_URL, Buffer.from('fabric installer'))

  http.text.set(`${FORGE_MAVEN}/maven-metadata.xml`, '<metadata><versioning><versions><version>1.20.1-47.2.0</version></versions></versioning></metadata>')
  http.files.set(forgeInstallerUrl('1.20.1', '47.2.0'), Buffer.from('forge installer'))
})

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true })
})

/**
 * Install a fake `java`: `-version` reports Java 21, anything else runs `installer` (a shell snippet
 * receiving the installer arguments).
 */
async function fakeJava(installer: string = 'exit 0') {
  const exec = path_.join(javaRoot, 'bin', 'java')
  await fs.mkdir(path_.dirname(exec), { recursive: true })
  await fs.writeFile(
    exec,
    [
      '#!/bin/sh',
      'if [ "$1" = "-version" ]; then',
      `  echo 'openjdk version "21.0.2" 2024-01-16' >&2`,
      `  echo 'OpenJDK 64-Bit Server VM (build 21.0.2+13, mixed mode)' >&2`,
      '  exit 0',
      'fi',
      installer,
      ''
    ].join('\n')
  )
  await fs.chmod(exec, 0o755)
  return exec
}

function manager(options: { javaProvider?: JavaProvider } = {}) {
  const lm = new LoaderManager({
    catalog: new VersionCatalog(http, { cacheDir: path_.join(dir, 'cache'), retryDelay: 0 }),
    java: new Java({ searchSystem: false, extraPaths: [javaRoot] }),
    runner: new ProcessRunner(),
    downloader: new Downloader(http),
    ...options
  })
  const stages: InstallStage[] = []
  lm.on('install_stage', ({ stage }) => stages.push(stage))
  return { lm, stages }
}

describe.skipIf(process.platform === 'win32')('LoaderManager', () => {
  describe('resolveInstall', () => {
    it('plans a vanilla server from the catalog', async () => {
      const { lm } = manager()
      const record = serverRecord({ id: 's1', path: path_.join(dir, 'survival') })
      const plan = await lm.resolveInstall(record)

      expect(plan).toMatchObject({
        kind: 'vanilla',
        gameVersion: '1.21.1',
        loaderVersion: null,
        javaMajor: 21,
        serverJarUrl: 'https://files.example.test/1.21.1/server.jar',
        serverJarSha1: sha(SERVER_JAR, 'sha1'),
        installerUrl: null,
        expectedArtifacts: ['server.jar']
      })
    })

    it('picks the latest stable Fabric loader', async () => {
      const { lm } = manager()
      const plan = await lm.resolveInstall(serverRecord({ id: 's1', path: path_.join(dir, 'modded'), loaderKind: 'fabric', gameVersion: '1.20.1' }))
      expect(plan).toMatchObject({ kind: 'fabric', loaderVersion: '0.16.10', installerUrl: INSTALLER_URL, javaMajor: 17 })
    })

    it('rejects Fabric on Minecraft older than 1.14', async () => {
      const { lm } = manager()
      const record = serverRecord({ id: 's1', path: path_.join(dir, 'old'), loaderKind: 'fabric', gameVersion: '1.12.2' })
      await expect(lm.resolveInstall(record)).rejects.toMatchObject({ code: 'CONFIG_ERROR' })
    })

    it('rejects an unknown loader version', async () => {
      const { lm } = manager()
      const record = serverRecord({ id: 's1', path: path_.join(dir, 'modded'), loaderKind: 'fabric', gameVersion: '1.20.1' })
      await expect(lm.resolveInstall(record, '0.1.0')).rejects.toMatchObject({ code: 'NOT_FOUND' })
    })

    it('rejects an unknown Minecraft version', async () => {
      const { lm } = manager()
      await expect(lm.resolveInstall(serverRecord({ id: 's1', path: dir, gameVersion: '1.99.0' }))).rejects.toMatchObject({ code: 'NOT_FOUND' })
    })
  })

  describe('execute', () => {
    it('downloads and verifies a vanilla server', async () => {
      const exec = await fakeJava()
      const { lm, stages } = manager()
      const target = path_.join(dir, 'survival')
      const result = await lm.execute(await lm.resolveInstall(serverRecord({ id: 's1', path: target })))

      expect(result).toMatchObject({ status: 'COMPLETE', javaPath: exec, artifact: 'server.jar', launchScript: null })
      expect(stages).toEqual(['RESOLVING_JAVA', 'DOWNLOADING', 'VERIFYING', 'COMPLETE'])
      expect(await fs.readFile(path_.join(target, 'server.jar'))).toEqual(SERVER_JAR)
    })

    it('fails at DOWNLOADING and leaves nothing when the SHA1 does not match', async () => {
      await fakeJava()
      http.files.set('https://files.example.test/1.21.1/server.jar', Buffer.from('tampered'))
      const { lm } = manager()
      const target = path_.join(dir, 'survival')
      const result = await lm.execute(await lm.resolveInstall(serverRecord({ id: 's1', path: target })))

      expect(result).toMatchObject({ status: 'FAILED', stage: 'DOWNLOADING', code: 'HASH_ERROR' })
      expect(await fs.readdir(target)).toEqual([])
    })

    it('fails at RESOLVING_JAVA without Java', async () => {
      const { lm, stages } = manager()
      const result = await lm.execute(await lm.resolveInstall(serverRecord({ id: 's1', path: path_.join(dir, 'survival') })))

      expect(result).toMatchObject({ status: 'FAILED', stage: 'RESOLVING_JAVA', code: 'JAVA_ERROR' })
      expect(stages).toEqual(['RESOLVING_JAVA', 'FAILED'])
    })

    it('asks the Java provider when no Java is installed', async () => {
      const provided = await fakeJava()
      const provider = { ensure: vi.fn(async () => provided) }
      // The fake Java is not discoverable from this root.
      javaRoot = path_.join(dir, 'nowhere')
      const { lm } = manager({ javaProvider: provider })

      const result = await lm.execute(await lm.resolveInstall(serverRecord({ id: 's1', path: path_.join(dir, 'survival') })))
      expect(result).toMatchObject({ status: 'COMPLETE', javaPath: provided })
      expect(provider.ensure).toHaveBeenCalledWith(21, { signal: undefined })
    })

    it('runs the Fabric installer and removes it afterwards', async () => {
      await fakeJava('echo "Installing Fabric $7 for $5"\ntouch "$9/fabric-server-launch.jar"\nexit 0')
      const { lm, stages } = manager()
      const output: string[] = []
      lm.on('install_output', ({ line }) => output.push(line))
      const target = path_.join(dir, 'modded')

      const plan = await lm.resolveInstall(serverRecord({ id: 's1', path: target, loaderKind: 'fabric', gameVersion: '1.20.1' }))
      const result = await lm.execute(plan)

      expect(result).toMatchObject({ status: 'COMPLETE', artifact: 'fabric-server-launch.jar' })
      expect(stages).toEqual(['RESOLVING_JAVA', 'DOWNLOADING', 'INSTALLING', 'VERIFYING', 'COMPLETE'])
      expect(output).toEqual(['Installing Fabric 0.16.10 for 1.20.1'])
      expect(await fs.readdir(target)).toEqual(['fabric-server-launch.jar'])
    })

    it('fails at VERIFYING when the installer produces nothing', async () => {
      await fakeJava('exit 0')
      const { lm } = manager()
      const plan = await lm.resolveInstall(serverRecord({ id: 's1', path: path_.join(dir, 'modded'), loaderKind: 'fabric', gameVersion: '1.20.1' }))

      expect(await lm.execute(plan)).toMatchObject({ status: 'FAILED', stage: 'VERIFYING', code: 'INSTALL_ERROR', exitCode: 0 })
    })

    it('fails at INSTALLING with the exit code of the installer', async () => {
      await fakeJava('echo "Failed to download libraries" >&2\nexit 2')
      const { lm } = manager()
      const plan = await lm.resolveInstall(serverRecord({ id: 's1', path: path_.join(dir, 'modded'), loaderKind: 'fabric', gameVersion: '1.20.1' }))

      expect(await lm.execute(plan)).toMatchObject({ status: 'FAILED', stage: 'INSTALLING', code: 'INSTALL_ERROR', exitCode: 2 })
    })

    it('requires the Forge libraries besides the launch scripts', async () => {
      await fakeJava('touch "$3/run.sh" "$3/run.bat"\nexit 0')
      const { lm } = manager()
      const plan = await lm.resolveInstall(serverRecord({ id: 's1', path: path_.join(dir, 'modded'), loaderKind: 'forge', gameVersion: '1.20.1' }))

      expect(plan.expectedLaunchScripts).toEqual(['run.sh', 'run.bat'])
      expect(await lm.execute(plan)).toMatchObject({ status: 'FAILED', stage: 'VERIFYING', code: 'INSTALL_ERROR', exitCode: 0 })
    })

    it('requires a launch script from a modern Forge installer', async () => {
      await fakeJava('mkdir -p "$3/libraries/net/minecraftforge/forge/1.20.1-47.2.0"\nexit 0')
      const { lm } = manager()
      const plan = await lm.resolveInstall(serverRecord({ id: 's1', path: path_.join(dir, 'modded'), loaderKind: 'forge', gameVersion: '1.20.1' }))

      expect(await lm.execute(plan)).toMatchObject({ status: 'FAILED', stage: 'VERIFYING', code: 'INSTALL_ERROR' })
    })

    it('installs Forge when both the libraries and a launch script exist', async () => {
      await fakeJava('mkdir -p "$3/libraries/net/minecraftforge/forge/1.20.1-47.2.0"\ntouch "$3/run.sh"\nexit 0')
      const { lm } = manager()
      const target = path_.join(dir, 'modded')
      const plan = await lm.resolveInstall(serverRecord({ id: 's1', path: target, loaderKind: 'forge', gameVersion: '1.20.1' }))

      expect(await lm.execute(plan)).toMatchObject({
        status: 'COMPLETE',
        artifact: path_.join('libraries', 'net', 'minecraftforge', 'forge', '1.20.1-47.2.0')
      })
      expect((await fs.readdir(target)).sort()).toEqual(['libraries', 'run.sh'])
    })

    it('keeps the download progress of concurrent installs apart', async () => {
      await fakeJava()
      const { lm } = manager()
      const progress = new Map<string, number[]>()
      lm.on('install_progress', ({ serverId, stage, percent }) => {
        if (stage === 'DOWNLOADING') progress.set(serverId, [...(progress.get(serverId) ?? []), percent])
      })

      const planA = await lm.resolveInstall(serverRecord({ id: 'a', path: path_.join(dir, 'a') }))
      const planB = await lm.resolveInstall(serverRecord({ id: 'b', path: path_.join(dir, 'b') }))
      const [a, b] = await Promise.all([lm.execute(planA), lm.execute(planB)])

      expect(a.status).toBe('COMPLETE')
      expect(b.status).toBe('COMPLETE')
      // Stage entry, then one event for the single chunk of each download
      expect(progress.get('a')).toEqual([10, 60])
      expect(progress.get('b')).toEqual([10, 60])
    })

    it('reports CANCELLED when cancelled before anything runs', async () => {
      await fakeJava()
      const { lm } = manager()
      const plan = await lm.resolveInstall(serverRecord({ id: 's1', path: path_.join(dir, 'survival') }))
      const controller = new AbortController()
      controller.abort()

      const result = await lm.execute(plan, { signal: controller.signal })
      expect(result).toMatchObject({ status: 'FAILED', code: 'CANCELLED' })
      expect(await pathsafety.exists(path_.join(dir, 'survival'))).toBe(false)
    })
  })
})
