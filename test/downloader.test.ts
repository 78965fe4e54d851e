import fs from 'node:fs/promises'
import path_ from 'node:path'
import { Readable } from 'node:stream'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import Downloader, { type DownloadProgress } from '../lib/utils/downloader'
import pathsafety from '../lib/utils/pathsafety'
import { MSMError, ErrorType } from '../types/errors'
import type { HttpClient, StreamResponse } from '../types/http'
import { sha, tmpdir } from './helpers'

/**
 * Serves each file in several chunks, yielding to the event loop between them so that concurrent
 * downloads interleave.
 */
class ChunkedHttp implements HttpClient {
  readonly files = new Map<string, Buffer[]>()

  async getJson(url: string): Promise<unknown> {
    throw new MSMError(ErrorType.NET_ERROR, `Request to ${url} failed`)
  }

  async getText(url: string): Promise<string> {
    throw new MSMError(ErrorType.NET_ERROR, `Request to ${url} failed`)
  }

  async getStream(url: string): Promise<StreamResponse> {
    const chunks = this.files.get(url)
    if (!chunks) throw new MSMError(ErrorType.NET_ERROR, `Request to ${url} failed`)
    const body = async function* () {
      for (const chunk of chunks) {
        await new Promise((resolve) => setImmediate(resolve))
        yield chunk
      }
    }
    return { size: chunks.reduce((n, c) => n + c.length, 0), body: Readable.from(body()) }
  }
}

let dir: string
let http: ChunkedHttp

beforeEach(async () => {
  dir = await tmpdir()
  http = new ChunkedHttp()
  http.files.set('https://files.example.test/a.jar', [Buffer.alloc(4, 'a'), Buffer.alloc(4, 'a'), Buffer.alloc(4, 'a')])
  http.files.set('https://files.example.test/b.jar', [Buffer.alloc(10, 'b'), Buffer.alloc(10, 'b')])
})

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true })
})

describe('Downloader', () => {
  it('reports the progress of concurrent downloads separately', async () => {
    const downloader = new Downloader(http)
    const a: DownloadProgress[] = []
    const b: DownloadProgress[] = []
    let events = 0
    downloader.on('download_progress', () => events++)

    await Promise.all([
      downloader.download('https://files.example.test/a.jar', path_.join(dir, 'a.jar'), { onProgress: (p) => a.push(p) }),
      downloader.download('https://files.example.test/b.jar', path_.join(dir, 'b.jar'), { onProgress: (p) => b.push(p) })
    ])

    expect(a.map((p) => [p.downloaded.size, p.total.size])).toEqual([
      [4, 12],
      [8, 12],
      [12, 12]
    ])
    expect(b.map((p) => [p.downloaded.size, p.total.size])).toEqual([
      [10, 20],
      [20, 20]
    ])
    expect(events).toBe(5)
    expect((await fs.readFile(path_.join(dir, 'a.jar'))).toString()).toBe('a'.repeat(12))
    expect((await fs.readFile(path_.join(dir, 'b.jar'))).toString()).toBe('b'.repeat(20))
  })

  it('counts completed downloads', async () => {
    const downloader = new Downloader(http)
    const ends: { amount: number; size: number }[] = []
    downloader.on('download_end', ({ downloaded }) => ends.push(downloaded))

    await downloader.download('https://files.example.test/a.jar', path_.join(dir, 'a.jar'))
    await downloader.download('https://files.example.test/b.jar', path_.join(dir, 'b.jar'))

    expect(ends).toEqual([
      { amount: 1, size: 12 },
      { amount: 2, size: 20 }
    ])
  })

  it('leaves nothing behind when the SHA1 does not match', async () => {
    const downloader = new Downloader(http)
    const dest = path_.join(dir, 'a.jar')

    await expect(downloader.download('https://files.example.test/a.jar', dest, { sha1: sha('other', 'sha1') })).rejects.toMatchObject({
      code: 'HASH_ERROR'
    })
    expect(await pathsafety.exists(dest)).toBe(false)
    expect(await pathsafety.exists(`${dest}.part`)).toBe(false)
  })
})
