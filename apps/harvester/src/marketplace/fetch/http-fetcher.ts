/**
 * HTTP Fetcher
 *
 * One GET per call using native fetch, with a per-request timeout and a
 * response size limit. Failures are classified here so the crawl driver only
 * has to look at the error type:
 * - TransientFetchError: network error, timeout, 408/429/5xx
 * - FatalFetchError: other non-2xx, oversized or non-JSON body
 *
 * No retries happen at this layer.
 */

import { FatalFetchError, TransientFetchError, isRetryableStatus, parseRetryAfter } from '../../errors.js'

export interface JsonFetchOptions {
  headers?: Record<string, string>
  timeoutMs?: number
  maxSizeBytes?: number
}

export interface JsonResponse {
  statusCode: number
  body: unknown
  durationMs: number
}

export const DEFAULT_JSON_FETCH_OPTIONS = {
  timeoutMs: 30000,
  maxSizeBytes: 20 * 1024 * 1024,
}

export class HttpFetcher {
  /**
   * Fetch a URL and decode its JSON body.
   */
  async fetchJson(url: string, options: JsonFetchOptions = {}): Promise<JsonResponse> {
    const startTime = Date.now()
    const timeoutMs = options.timeoutMs ?? DEFAULT_JSON_FETCH_OPTIONS.timeoutMs
    const maxSizeBytes = options.maxSizeBytes ?? DEFAULT_JSON_FETCH_OPTIONS.maxSizeBytes

    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs)

    let response: Response
    try {
      response = await fetch(url, {
        method: 'GET',
        headers: options.headers,
        signal: controller.signal,
        redirect: 'follow',
      })
    } catch (error) {
      clearTimeout(timeoutId)
      if (error instanceof Error && error.name === 'AbortError') {
        throw new TransientFetchError(`Request timed out after ${timeoutMs}ms`, { url, cause: error })
      }
      const reason = error instanceof Error ? error.message : String(error)
      throw new TransientFetchError(`Network error: ${reason}`, { url, cause: error })
    }

    try {
      if (!response.ok) {
        // Drain the body so the connection can be reused
        await response.body?.cancel()
        const message = `HTTP ${response.status}: ${response.statusText}`
        if (isRetryableStatus(response.status)) {
          throw new TransientFetchError(message, {
            url,
            statusCode: response.status,
            retryAfterMs: parseRetryAfter(response.headers.get('retry-after')),
          })
        }
        throw new FatalFetchError(message, { url, statusCode: response.status })
      }

      const contentLength = response.headers.get('content-length')
      if (contentLength && Number.parseInt(contentLength, 10) > maxSizeBytes) {
        await response.body?.cancel()
        throw new FatalFetchError(`Response too large: ${contentLength} bytes`, {
          url,
          statusCode: response.status,
        })
      }

      const text = await this.readBodyWithLimit(response, maxSizeBytes, url)
      if (text === null) {
        throw new FatalFetchError('Response exceeded size limit', { url, statusCode: response.status })
      }

      let body: unknown
      try {
        body = JSON.parse(text)
      } catch (error) {
        throw new FatalFetchError('Response body is not valid JSON', {
          url,
          statusCode: response.status,
          cause: error,
        })
      }

      return {
        statusCode: response.status,
        body,
        durationMs: Date.now() - startTime,
      }
    } finally {
      clearTimeout(timeoutId)
    }
  }

  /**
   * Read response body with size limit.
   * Returns null if size exceeds limit.
   */
  private async readBodyWithLimit(
    response: Response,
    maxBytes: number,
    url: string
  ): Promise<string | null> {
    const reader = response.body?.getReader()
    if (!reader) {
      return ''
    }

    const chunks: Uint8Array[] = []
    let totalSize = 0

    try {
      while (true) {
        const { done, value } = await reader.read()
        if (done) break

        totalSize += value.length
        if (totalSize > maxBytes) {
          await reader.cancel()
          return null
        }

        chunks.push(value)
      }
    } catch (error) {
      // Connection dropped or timed out mid-body
      const reason = error instanceof Error ? error.message : String(error)
      throw new TransientFetchError(`Failed to read response body: ${reason}`, { url, cause: error })
    } finally {
      reader.releaseLock()
    }

    return new TextDecoder('utf-8').decode(Buffer.concat(chunks))
  }
}
