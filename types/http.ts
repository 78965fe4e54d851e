export interface RequestOptions {
  /** [Optional: default is the client timeout] Timeout in ms. */
  timeout?: number
  signal?: AbortSignal
  headers?: Record<string, string>
}

export interface StreamResponse {
  /** Total size in bytes, `0` if unknown. */
  size: number
  body: NodeJS.ReadableStream
}

/**
 * HTTP capability used by the catalog, the loader manager and the update checker.
 * Implementations follow redirects and reject on non-2xx responses.
 */
export interface HttpClient {
  getJson(url: string, options?: RequestOptions): Promise<unknown>
  getText(url: string, options?: RequestOptions): Promise<string>
  getStream(url: string, options?: RequestOptions): Promise<StreamResponse>
}
