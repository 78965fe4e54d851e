/**
 * @license MIT
 * @copyright Copyright (c) 2026, GoldFrite
 */

import fsSync from 'node:fs'
import fs from 'node:fs/promises'
import path_ from 'node:path'
import { pipeline } from 'node:stream/promises'
import EventEmitter from './events'
import type { DownloaderEvents } from '../../types/events'
import type { HttpClient } from '../../types/http'
import { MSMError, ErrorType, errorMessage } from '../../types/errors'
import pathsafety from './pathsafety'

export interface DownloadOptions {
  signal?: AbortSignal
  /** [Optional] Expected SHA1 of the file. */
  sha1?: string | null
  /** [Optional: default is `'FILE'`] Type reported in the progress events. */
  type?: string
  /** [Optional: default is `false`] Make the file executable (not on Windows). */
  executable?: boolean
  /** [Optional: default is `1`] Retries after a network error. */
  retries?: number
  /** [Optional] Called with the progress of this download only. */
  onProgress?: (progress: DownloadProgress) => void
}

export type DownloadProgress = DownloaderEvents['download_progress'][0]

export default class Downloader extends EventEmitter<DownloaderEvents> {
  private readonly http: HttpClient
  private completed = 0

  constructor(http: HttpClient) {
    super()
    this.http = http
  }

  /**
   * Download a file. The content is written to `<dest>.part`, renamed to `dest` once complete.
   * On failure or cancellation, nothing is left at `dest` nor at `<dest>.part`.
   * @param url The URL of the file.
   * @param dest Destination path.
   * @returns `dest`.
   */
  async download(url: string, dest: string, options: DownloadOptions = {}): Promise<string> {
    const retries = options.retries ?? 1
    const name = path_.basename(dest)

    for (let attempt = 0; ; attempt++) {
      try {
        const size = await this.downloadFile(url, dest, options)
        this.completed++
        this.emit('download_end', { downloaded: { amount: this.completed, size } })
        return dest
      } catch (err) {
        const retryable = err instanceof MSMError && err.category === 'NETWORK' && !options.signal?.aborted
        if (retryable && attempt < retries) {
          await new Promise((r) => setTimeout(r, 1000 * (attempt + 1)))
          continue
        }
        this.emit('download_error', { filename: name, type: options.type ?? 'FILE', message: errorMessage(err) })
        if (err instanceof MSMError) throw err
        throw new MSMError(ErrorType.DOWNLOAD_ERROR, `Failed to download ${name}: ${errorMessage(err)}`)
      }
    }
  }

  private async downloadFile(url: string, dest: string, options: DownloadOptions): Promise<number> {
    const part = `${dest}.part`
    const type = options.type ?? 'FILE'
    await fs.mkdir(path_.dirname(dest), { recursive: true })

    const res = await this.http.getStream(url, { signal: options.signal })
    const state: ProgressState = { size: res.size, downloaded: 0, speed: 0, lastTime: Date.now(), lastSize: 0 }

    try {
      const progress = this.progress(state, type, options.onProgress)
      await pipeline(
        res.body,
        async function* (source: AsyncIterable<string | Buffer>) {
          for await (const chunk of source) {
            progress(chunk.length)
            yield chunk
          }
        },
        fsSync.createWriteStream(part),
        { signal: options.signal }
      )

      if (options.sha1) {
        const sha1 = await pathsafety.digest(part, 'sha1')
        if (sha1 !== options.sha1.toLowerCase()) {
          throw new MSMError(ErrorType.HASH_ERROR, `Invalid SHA1 for ${path_.basename(dest)}: expected ${options.sha1}, got ${sha1}`, {
            path: dest
          })
        }
      }

      await fs.rename(part, dest)
      if (process.platform !== 'win32' && options.executable) await fs.chmod(dest, 0o755)
      return state.downloaded
    } catch (err) {
      await fs.rm(part, { force: true })
      if (err instanceof MSMError) throw err
      if (options.signal?.aborted) throw new MSMError(ErrorType.CANCELLED, `Download of ${path_.basename(dest)} cancelled`)
      throw new MSMError(ErrorType.DOWNLOAD_ERROR, `Error while downloading ${url}: ${errorMessage(err)}`)
    }
  }

  private progress(state: ProgressState, type: string, onProgress?: (progress: DownloadProgress) => void) {
    return (length: number) => {
      state.downloaded += length

      const now = Date.now()
      const diffTime = now - state.lastTime
      if (diffTime > 500) {
        state.speed = (state.downloaded - state.lastSize) / (diffTime / 1000)
        state.lastTime = now
        state.lastSize = state.downloaded
      }

      const event: DownloadProgress = {
        total: { amount: 1, size: state.size },
        downloaded: { amount: 0, size: state.downloaded },
        speed: Math.floor(state.speed),
        type
      }
      onProgress?.(event)
      this.emit('download_progress', event)
    }
  }
}

interface ProgressState {
  size: number
  downloaded: number
  speed: number
  lastTime: number
  lastSize: number
}
