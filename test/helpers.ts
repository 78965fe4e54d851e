/**
 * @license MIT
 * @copyright Copyright (c) 2026, GoldFrite
 */

import crypto from 'node:crypto'
import fs from 'node:fs/promises'
import net from 'node:net'
import os from 'node:os'
import path_ from 'node:path'
import { Readable } from 'node:stream'
import { MSMError, ErrorType } from '../types/errors'
import type { HttpClient, RequestOptions, StreamResponse } from '../types/http'
import type { ServerRecord } from '../types/server'

/**
 * In-memory `HttpClient`. Unknown URLs fail with a `NET_ERROR`, like an unreachable host.
 */
export class FakeHttp implements HttpClient {
  readonly json = new Map<string, unknown>()
  readonly text = new Map<string, string>()
  readonly files = new Map<string, Buffer>()
  readonly requests: string[] = []

  async getJson(url: string, options: RequestOptions = {}): Promise<unknown> {
    this.record(url, options)
    if (!this.json.has(url)) throw unreachable(url)
    return structuredClone(this.json.get(url))
  }

  async getText(url: string, options: RequestOptions = {}): Promise<string> {
    this.record(url, options)
    const text = this.text.get(url)
    if (text === undefined) throw unreachable(url)
    return text
  }

  async getStream(url: string, options: RequestOptions = {}): Promise<StreamResponse> {
    this.record(url, options)
    const data = this.files.get(url)
    if (!data) throw unreachable(url)
    return { size: data.length, body: Readable.from([data]) }
  }

  private record(url: string, options: RequestOptions) {
    this.requests.push(url)
    if (options.signal?.aborted) throw new MSMError(ErrorType.CANCELLED, `Request to ${url} cancelled`)
  }
}

function unreachable(url: string) {
  return new MSMError(ErrorType.NET_ERROR, `Request to ${url} failed: getaddrinfo ENOTFOUND`)
}

export async function tmpdir(prefix: string = 'msm-test-') {
  return await fs.mkdtemp(path_.join(os.tmpdir(), prefix))
}

export function sha(data: string | Buffer, algorithm: 'sha1' | 'sha256' | 'sha512' = 'sha256') {
  return crypto.createHash(algorithm).update(data).digest('hex')
}

/**
 * A TCP port nothing listens on.
 */
export function freePort(): Promise<number> {
  return new Promise((resolve, reject) => {
    const server = net.createServer()
    server.once('error', reject)
    server.listen(0, () => {
      const address = server.address()
      const port = typeof address === 'object' && address ? address.port : 0
      server.close(() => resolve(port))
    })
  })
}

export function serverRecord(fields: Partial<ServerRecord> & Pick<ServerRecord, 'id' | 'path'>): ServerRecord {
  return {
    name: path_.basename(fields.path),
    loaderKind: 'vanilla',
    gameVersion: '1.21.1',
    loaderVersion: null,
    port: null,
    javaPath: null,
    backupPath: null,
    lastState: 'CONFIGURED',
    memoryMaxMb: 2048,
    memoryMinMb: null,
    eulaAccepted: true,
    ...fields
  }
}
