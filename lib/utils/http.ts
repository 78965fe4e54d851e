/**
 * @license MIT
 * @copyright Copyright (c) 2026, GoldFrite
 */

import fetch, { type Response } from 'node-fetch'
import http from 'node:http'
import https from 'node:https'
import { MSMError, ErrorType, errorMessage } from '../../types/errors'
import type { HttpClient, RequestOptions, StreamResponse } from '../../types/http'
import utils from './utils'

/**
 * Default `HttpClient`, on `node-fetch`. Redirects are followed, non-2xx responses are rejected
 * with a `FETCH_ERROR`, network failures and timeouts with a `NET_ERROR`, and aborted requests
 * with `CANCELLED`.
 */
export default class FetchHttpClient implements HttpClient {
  private readonly timeout: number
  private readonly userAgent: string
  private httpAgent = new http.Agent({ keepAlive: true, maxSockets: 16 })
  private httpsAgent = new https.Agent({ keepAlive: true, maxSockets: 16 })

  /**
   * @param timeout [Optional: default is `15000`] Default timeout of the requests, in ms.
   * @param userAgent [Optional] User-Agent header sent with every request.
   */
  constructor(timeout: number = 15000, userAgent: string = 'msm-core') {
    this.timeout = timeout
    this.userAgent = userAgent
  }

  async getJson(url: string, options: RequestOptions = {}): Promise<unknown> {
    const text = await this.getText(url, { ...options, headers: { Accept: 'application/json', ...options.headers } })
    try {
      return JSON.parse(text)
    } catch (err) {
      throw new MSMError(ErrorType.FETCH_ERROR, `Invalid JSON received from ${url}: ${errorMessage(err)}`)
    }
  }

  async getText(url: string, options: RequestOptions = {}): Promise<string> {
    const { controller, clear } = this.abortable(options)
    try {
      const res = await this.request(url, options, controller.signal)
      return await res.text()
    } catch (err) {
      throw this.toError(err, url, options)
    } finally {
      clear()
    }
  }

  /**
   * Open a streamed response. The timeout applies to the connection, then to every pause of the body.
   */
  async getStream(url: string, options: RequestOptions = {}): Promise<StreamResponse> {
    const timeout = options.timeout ?? this.timeout
    const { controller, clear } = this.abortable(options)
    let res: Response
    try {
      res = await this.request(url, options, controller.signal)
    } catch (err) {
      clear()
      throw this.toError(err, url, options)
    }
    clear()

    const body = res.body
    let idle = setTimeout(() => controller.abort(), timeout)
    const onAbort = () => controller.abort()
    options.signal?.addEventListener('abort', onAbort)
    const release = () => {
      clearTimeout(idle)
      options.signal?.removeEventListener('abort', onAbort)
    }
    body.on('data', () => {
      clearTimeout(idle)
      idle = setTimeout(() => controller.abort(), timeout)
    })
    body.on('end', release)
    body.on('error', release)
    body.on('close', release)

    const length = parseInt(res.headers.get('content-length') ?? '0', 10)
    return { size: Number.isNaN(length) ? 0 : length, body }
  }

  private async request(url: string, options: RequestOptions, signal: AbortSignal) {
    const res = await fetch(url, {
      agent: url.startsWith('https') ? this.httpsAgent : this.httpAgent,
      headers: { 'User-Agent': this.userAgent, ...options.headers },
      redirect: 'follow',
      signal
    })
    if (!res.ok) {
      throw new MSMError(ErrorType.FETCH_ERROR, `Error while fetching ${url}: HTTP ${res.status} ${res.statusText}`)
    }
    return res
  }

  private abortable(options: RequestOptions) {
    const controller = new AbortController()
    const timer = setTimeout(() => controller.abort(), options.timeout ?? this.timeout)
    const onAbort = () => controller.abort()
    if (options.signal?.aborted) controller.abort()
    options.signal?.addEventListener('abort', onAbort)
    return {
      controller,
      clear: () => {
        clearTimeout(timer)
        options.signal?.removeEventListener('abort', onAbort)
      }
    }
  }

  private toError(err: unknown, url: string, options: RequestOptions) {
    if (err instanceof MSMError) return err
    if (options.signal?.aborted) return new MSMError(ErrorType.CANCELLED, `Request to ${url} cancelled`)
    if (err instanceof Error && err.name === 'AbortError') {
      return new MSMError(ErrorType.NET_ERROR, `Request to ${url} timed out after ${options.timeout ?? this.timeout}ms`)
    }
    return new MSMError(ErrorType.NET_ERROR, `Request to ${url} failed: ${errorMessage(err)}`)
  }
}

/**
 * Run `fn`, and run it once more after `backoff` ms if it fails with a network error.
 * Other errors (verification, cancellation) are never retried.
 */
export async function retryOnce<T>(fn: () => Promise<T>, backoff: number = 1000, signal?: AbortSignal): Promise<T> {
  try {
    return await fn()
  } catch (err) {
    if (!(err instanceof MSMError) || err.category !== 'NETWORK') throw err
    await utils.sleep(backoff, signal)
    if (signal?.aborted) throw new MSMError(ErrorType.CANCELLED, 'Request cancelled')
    return await fn()
  }
}
