/**
 * Fetch wrapper with timeout and optional retries with exponential backoff.
 *
 * The body is read inside the attempt, so the timeout and the caller's signal
 * cover the whole exchange, not just the response headers.
 *
 * Retries are off by default (maxRetries = 0): the crawl loops already skip a
 * failed page and move on. Any failure surfaces as a FetchError; an abort of
 * the caller's signal is rethrown as-is.
 */

import { FetchError, errorMessage } from '../lib/errors.js'
import { logger } from '../lib/logger.js'
import { abortable } from './abortable.js'
import { sleep } from './sleep.js'

export interface FetchOptions extends RequestInit {
  timeoutMs?: number
  maxRetries?: number
  /** First backoff delay; doubles on every further attempt */
  backoffMs?: number
}

/** A successful response with its body fully read */
export interface FetchResult {
  url: string
  status: number
  contentType: string | null
  body: ArrayBuffer
}

export async function fetchWithRetry(
  url: string,
  options: FetchOptions = {}
): Promise<FetchResult> {
  const { timeoutMs = 30_000, maxRetries = 0, backoffMs = 1000, signal, ...fetchOpts } = options

  let lastError: FetchError | null = null

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    const controller = new AbortController()
    const timer = setTimeout(
      () => controller.abort(new Error(`timed out after ${timeoutMs}ms`)),
      timeoutMs
    )
    const onAbort = () => controller.abort(signal?.reason)
    signal?.addEventListener('abort', onAbort, { once: true })

    try {
      const res = await fetch(url, {
        ...fetchOpts,
        signal: controller.signal,
      })

      if (res.ok) {
        const body = await abortable(res.arrayBuffer(), controller.signal)
        return {
          url: res.url || url,
          status: res.status,
          contentType: res.headers.get('content-type'),
          body,
        }
      }

      await res.body?.cancel()
      lastError = new FetchError(url, `HTTP ${res.status}: ${res.statusText}`, res.status)
    } catch (err) {
      if (signal?.aborted) throw signal.reason
      const reason = controller.signal.aborted ? controller.signal.reason : err
      lastError = new FetchError(url, errorMessage(reason), null, { cause: err })
    } finally {
      clearTimeout(timer)
      signal?.removeEventListener('abort', onAbort)
    }

    if (attempt < maxRetries) {
      const delay = backoffMs * Math.pow(2, attempt)
      logger.warn({ url, delay, attempt: attempt + 1 }, `fetch failed: ${lastError.message}, retrying`)
      await sleep(delay, signal ?? undefined)
    }
  }

  throw lastError ?? new FetchError(url, 'request failed')
}
