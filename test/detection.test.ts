import AdmZip from 'adm-zip'
import fs from 'node:fs/promises'
import path_ from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { detectLoaderKind, detectServer, detectVersions, findLaunchScript, findServerJar, isEulaAccepted, parseMemoryArgs } from '../lib/server/detection'
import { tmpdir } from './helpers'

let dir: string

beforeEach(async () => {
  dir = await tmpdir()
})

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true })
})

async function touch(...segments: string[]) {
  const file = path_.join(dir, ...segments)
  await fs.mkdir(path_.dirname(file), { recursive: true })
  await fs.writeFile(file, '')
}

function vanillaJar(id: string) {
  const zip = new AdmZip()
  zip.addFile('version.json', Buffer.from(JSON.stringify({ id, name: id, world_version: 3955 })))
  return zip.toBuffer()
}

describe('detectLoaderKind', () => {
  it('detects Fabric before the vanilla jar it downloads', async () => {
    await touch('fabric-server-launch.jar')
    await touch('server.jar')
    expect(await detectLoaderKind(dir)).toBe('fabric')
  })

  it('detects Forge from its libraries', async () => {
    await touch('libraries', 'net', 'minecraftforge', 'forge', '1.20.1-47.2.0', 'forge-1.20.1-47.2.0-server.jar')
    expect(await detectLoaderKind(dir)).toBe('forge')
  })

  it('ignores the Forge installer', async () => {
    await touch('forge-1.20.1-47.2.0-installer.jar')
    expect(await detectLoaderKind(dir)).toBeNull()
  })

  it('detects a vanilla server', async () => {
    await touch('minecraft_server.jar')
    expect(await detectLoaderKind(dir)).toBe('vanilla')
  })
})

describe('detectVersions', () => {
  it('reads the Minecraft version from the server jar', async () => {
    await fs.writeFile(path_.join(dir, 'server.jar'), vanillaJar('1.21.1'))
    expect(await detectVersions(dir, 'vanilla')).toEqual({ gameVersion: '1.21.1', loaderVersion: null })
  })

  it('picks the newest Forge library', async () => {
    await touch('libraries', 'net', 'minecraftforge', 'forge', '1.20.1-47.1.0', 'x.jar')
    await touch('libraries', 'net', 'minecraftforge', 'forge', '1.20.1-47.10.0', 'x.jar')
    expect(await detectVersions(dir, 'forge')).toEqual({ gameVersion: '1.20.1', loaderVersion: '47.10.0' })
  })

  it('reads the Fabric loader from its libraries and Minecraft from the log', async () => {
    await touch('libraries', 'net', 'fabricmc', 'fabric-loader', '0.15.11', 'fabric-loader-0.15.11.jar')
    await touch('libraries', 'net', 'fabricmc', 'fabric-loader', '0.16.9', 'fabric-loader-0.16.9.jar')
    await fs.mkdir(path_.join(dir, 'logs'))
    await fs.writeFile(path_.join(dir, 'logs', 'latest.log'), '[12:00:00] [Server thread/INFO]: Starting minecraft server version 1.20.4\n')
    expect(await detectVersions(dir, 'fabric')).toEqual({ gameVersion: '1.20.4', loaderVersion: '0.16.9' })
  })

  it('returns nulls when nothing is known', async () => {
    expect(await detectVersions(dir, 'vanilla')).toEqual({ gameVersion: null, loaderVersion: null })
  })
})

describe('findLaunchScript', () => {
  it('follows the priority order', async () => {
    await touch('start.sh')
    await touch('run.sh')
    expect(await findLaunchScript(dir, 'linux')).toBe(path_.join(dir, 'run.sh'))
    await touch('start_server.sh')
    expect(await findLaunchScript(dir, 'linux')).toBe(path_.join(dir, 'start_server.sh'))
  })

  it('looks for batch files on Windows', async () => {
    await touch('run.sh')
    expect(await findLaunchScript(dir, 'win32')).toBeNull()
    await touch('run.bat')
    expect(await findLaunchScript(dir, 'win32')).toBe(path_.join(dir, 'run.bat'))
  })
})

describe('findServerJar', () => {
  it('prefers the loader jar', async () => {
    await touch('server.jar')
    await touch('fabric-server-launch.jar')
    expect(await findServerJar(dir, 'fabric')).toBe('fabric-server-launch.jar')
    expect(await findServerJar(dir, 'vanilla')).toBe('server.jar')
  })

  it('finds the Forge jar but not its installer', async () => {
    await touch('forge-1.16.5-36.2.39-installer.jar')
    await touch('forge-1.16.5-36.2.39.jar')
    expect(await findServerJar(dir, 'forge')).toBe('forge-1.16.5-36.2.39.jar')
  })
})

describe('isEulaAccepted', () => {
  it('requires eula=true', async () => {
    expect(await isEulaAccepted(dir)).toBe(false)
    await fs.writeFile(path_.join(dir, 'eula.txt'), '#By changing the setting below to TRUE...\neula=false\n')
    expect(await isEulaAccepted(dir)).toBe(false)
    await fs.writeFile(path_.join(dir, 'eula.txt'), '#By changing the setting below to TRUE...\r\neula = TRUE\r\n')
    expect(await isEulaAccepted(dir)).toBe(true)
  })
})

describe('parseMemoryArgs', () => {
  it('converts every unit to MB', () => {
    expect(parseMemoryArgs('java -Xms512M -Xmx4G -jar server.jar nogui')).toEqual({ maxMb: 4096, minMb: 512 })
    expect(parseMemoryArgs('-Xmx2097152k')).toEqual({ maxMb: 2048, minMb: null })
    expect(parseMemoryArgs('-Xmx1073741824')).toEqual({ maxMb: 1024, minMb: null })
  })

  it('returns nulls without memory arguments', () => {
    expect(parseMemoryArgs('java -jar server.jar')).toEqual({ maxMb: null, minMb: null })
  })
})

describe('detectServer', () => {
  it('collects the settings of an existing server', async () => {
    await fs.writeFile(path_.join(dir, 'server.jar'), vanillaJar('1.20.1'))
    await fs.writeFile(path_.join(dir, 'start.sh'), '#!/bin/sh\njava -Xms1G -Xmx3G -jar server.jar nogui\n')
    await fs.writeFile(path_.join(dir, 'server.properties'), 'server-port=25570\nmotd=old\n')
    await fs.writeFile(path_.join(dir, 'eula.txt'), 'eula=true\n')

    expect(await detectServer(dir, 'linux')).toEqual({
      path: dir,
      loaderKind: 'vanilla',
      gameVersion: '1.20.1',
      loaderVersion: null,
      launchScript: path_.join(dir, 'start.sh'),
      eulaAccepted: true,
      port: 25570,
      memoryMaxMb: 3072,
      memoryMinMb: 1024
    })
  })

  it('reads the memory of a Forge server from its JVM arguments', async () => {
    await touch('libraries', 'net', 'minecraftforge', 'forge', '1.20.1-47.2.0', 'forge-1.20.1-47.2.0-server.jar')
    await fs.writeFile(path_.join(dir, 'run.sh'), '#!/usr/bin/env sh\njava @user_jvm_args.txt @libraries/net/minecraftforge/forge/1.20.1-47.2.0/unix_args.txt "$@"\n')
    await fs.writeFile(path_.join(dir, 'user_jvm_args.txt'), '# Xmx and Xms set the maximum and minimum RAM usage\n-Xmx6G\n')

    expect(await detectServer(dir, 'linux')).toMatchObject({
      loaderKind: 'forge',
      gameVersion: '1.20.1',
      loaderVersion: '47.2.0',
      launchScript: path_.join(dir, 'run.sh'),
      eulaAccepted: false,
      port: null,
      memoryMaxMb: 6144,
      memoryMinMb: null
    })
  })

  it('ignores folders that are not servers', async () => {
    await touch('notes.txt')
    expect(await detectServer(dir, 'linux')).toBeNull()
  })
})
