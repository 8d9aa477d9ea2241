/**
 * ReleaseClient: fetches release manifests and binary blobs over HTTP(S).
 *
 * Uses Node.js built-in `https`/`http` modules (no extra HTTP dependency).
 * Redirects are followed, which GitHub release downloads rely on.
 */

import http from 'node:http'
import https from 'node:https'
import { HttpRequestError, ManifestParseError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'

const logger = createLogger('release-client')

/** Large binaries over slow links: minutes, not seconds */
export const DEFAULT_REQUEST_TIMEOUT_MS = 300_000

const MAX_REDIRECTS = 5

// ---------------------------------------------------------------------------
// Interface
// ---------------------------------------------------------------------------

/**
 * Network access used by the version manager. Tests substitute an
 * in-process implementation.
 */
export interface ReleaseClient {
  /** GET `url` and parse the body as JSON */
  fetchJson(url: string): Promise<unknown>
  /** GET `url` and return the raw body */
  download(url: string): Promise<Buffer>
}

// ---------------------------------------------------------------------------
// HttpsReleaseClient
// ---------------------------------------------------------------------------

export class HttpsReleaseClient implements ReleaseClient {
  private readonly timeoutMs: number

  constructor(timeoutMs = DEFAULT_REQUEST_TIMEOUT_MS) {
    this.timeoutMs = timeoutMs
  }

  async fetchJson(url: string): Promise<unknown> {
    const body = await this.get(url)
    try {
      const parsed: unknown = JSON.parse(body.toString('utf-8'))
      return parsed
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      throw new ManifestParseError(`Failed to parse JSON from ${url}: ${message}`, { url })
    }
  }

  async download(url: string): Promise<Buffer> {
    const body = await this.get(url)
    logger.debug({ url, bytes: body.length }, 'Download complete')
    return body
  }

  /**
   * GET a URL, following up to MAX_REDIRECTS redirects. The timeout covers
   * the whole exchange including redirects and body transfer.
   */
  private get(url: string): Promise<Buffer> {
    return new Promise<Buffer>((resolve, reject) => {
      let settled = false
      let current: http.ClientRequest | undefined

      const safeReject = (err: HttpRequestError): void => {
        if (!settled) {
          settled = true
          clearTimeout(timer)
          reject(err)
        }
      }

      const safeResolve = (value: Buffer): void => {
        if (!settled) {
          settled = true
          clearTimeout(timer)
          resolve(value)
        }
      }

      const timer = setTimeout(() => {
        current?.destroy()
        safeReject(new HttpRequestError(`Request timed out after ${this.timeoutMs}ms`, url))
      }, this.timeoutMs)

      const request = (target: string, hopsLeft: number): void => {
        let parsed: URL
        try {
          parsed = new URL(target)
        } catch {
          safeReject(new HttpRequestError(`Invalid URL: ${target}`, target))
          return
        }

        const onResponse = (res: http.IncomingMessage): void => {
          const status = res.statusCode ?? 0

          if (status >= 300 && status < 400 && res.headers.location) {
            res.resume()
            if (hopsLeft === 0) {
              safeReject(new HttpRequestError(`Too many redirects fetching ${url}`, url, status))
              return
            }
            request(new URL(res.headers.location, parsed).toString(), hopsLeft - 1)
            return
          }

          if (status !== 200) {
            res.resume()
            safeReject(new HttpRequestError(`HTTP ${String(status)} fetching ${target}`, target, status))
            return
          }

          collectBody(res, safeResolve, (err) => {
            safeReject(new HttpRequestError(`Response stream error: ${err.message}`, target, status))
          })
        }

        logger.debug({ url: target }, 'GET')
        current =
          parsed.protocol === 'http:' ? http.get(parsed, onResponse) : https.get(parsed, onResponse)

        current.on('error', (err) => {
          // Fires after destroy() on timeout too; safeReject ignores the second settle
          safeReject(new HttpRequestError(`Network error: ${err.message}`, target))
        })
      }

      request(url, MAX_REDIRECTS)
    })
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function collectBody(
  res: http.IncomingMessage,
  resolve: (value: Buffer) => void,
  reject: (reason: Error) => void
): void {
  const chunks: Buffer[] = []

  res.on('data', (chunk: Buffer) => {
    chunks.push(chunk)
  })

  res.on('end', () => {
    resolve(Buffer.concat(chunks))
  })

  res.on('error', reject)
}
