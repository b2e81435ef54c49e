/**
 * Fetch Layer — one GET per call, always paced by the shared DomainLimiter.
 *
 * An HttpClient is the run-scoped resource of a store crawl: close() aborts
 * whatever is still in flight.
 */

import type { JsonValue } from '../schema/game-record.js'
import { DecodeError, FetchError } from '../lib/errors.js'
import { fetchWithRetry, type FetchResult } from './fetch-with-retry.js'
import type { DomainLimiter } from './rate-limiter.js'

export interface HttpClientOptions {
  limiter: DomainLimiter
  headers?: Record<string, string>
  timeoutMs?: number
  maxRetries?: number
  /** Parent cancellation, e.g. the whole run being aborted */
  signal?: AbortSignal
}

export class HttpClient {
  private readonly controller = new AbortController()

  constructor(private readonly options: HttpClientOptions) {
    const parent = options.signal
    if (parent?.aborted) this.controller.abort(parent.reason)
    else parent?.addEventListener('abort', () => this.controller.abort(parent.reason), { once: true })
  }

  get signal(): AbortSignal {
    return this.controller.signal
  }

  get closed(): boolean {
    return this.controller.signal.aborted
  }

  /** Fetch a page as text (HTML) */
  async getText(url: string, headers: Record<string, string> = {}): Promise<string> {
    const res = await this.request(url, headers)
    return decodeBody(res.body, res.contentType)
  }

  /** Fetch and decode a JSON document; DecodeError when the body is not JSON */
  async getJson(url: string, headers: Record<string, string> = {}): Promise<JsonValue> {
    const body = await this.getText(url, { Accept: 'application/json', ...headers })
    try {
      const value: JsonValue = JSON.parse(body)
      return value
    } catch (err) {
      throw new DecodeError(url, { cause: err })
    }
  }

  close(): void {
    if (!this.closed) this.controller.abort(new Error('http client closed'))
  }

  private async request(url: string, headers: Record<string, string>): Promise<FetchResult> {
    let host: string
    try {
      host = new URL(url).hostname
    } catch (err) {
      throw new FetchError(url, 'invalid URL', null, { cause: err })
    }

    await this.options.limiter.acquire(host, this.signal)

    return fetchWithRetry(url, {
      method: 'GET',
      headers: { ...this.options.headers, ...headers },
      redirect: 'follow',
      timeoutMs: this.options.timeoutMs,
      maxRetries: this.options.maxRetries,
      signal: this.signal,
    })
  }
}

/** Decode a body with the charset named in its Content-Type, UTF-8 otherwise */
export function decodeBody(body: ArrayBuffer, contentType: string | null): string {
  const charset = contentType?.match(/charset\s*=\s*"?([\w.:-]+)"?/i)?.[1]
  if (charset) {
    try {
      return new TextDecoder(charset).decode(body)
    } catch {
      // unknown label; fall through to UTF-8
    }
  }
  return new TextDecoder('utf-8').decode(body)
}
