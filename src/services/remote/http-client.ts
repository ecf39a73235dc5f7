/**
 * HTTP Client Module
 *
 * fetch wrapper shared by the remote adapters. Maps transport failures and
 * HTTP statuses onto the sync error taxonomy and validates JSON bodies with
 * zod before they reach the reconcilers.
 */

import {
  decodingError,
  kindForStatus,
  networkError,
  SyncError,
} from '@root/types/errors.js'
import type { z } from 'zod'

export interface RequestOptions {
  method?: 'GET' | 'POST' | 'PUT' | 'DELETE'
  headers?: Record<string, string>
  /** Serialized as JSON */
  body?: unknown
  timeoutMs: number
}

/**
 * Performs a request and returns the raw response when its status is 2xx.
 *
 * @throws SyncError NetworkError when the server is unreachable or times out,
 * otherwise the kind matching the HTTP status
 */
export async function sendRequest(
  url: string,
  options: RequestOptions,
): Promise<Response> {
  const headers: Record<string, string> = {
    Accept: 'application/json',
    ...options.headers,
  }
  if (options.body !== undefined) {
    headers['Content-Type'] = 'application/json'
  }

  let response: Response
  try {
    response = await fetch(url, {
      method: options.method ?? 'GET',
      headers,
      body: options.body === undefined ? undefined : JSON.stringify(options.body),
      signal: AbortSignal.timeout(options.timeoutMs),
    })
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw networkError(`Request to ${redactUrl(url)} failed: ${reason}`, error)
  }

  if (!response.ok) {
    const detail = await readErrorDetail(response)
    throw new SyncError(
      kindForStatus(response.status),
      `${options.method ?? 'GET'} ${redactUrl(url)} returned ${response.status}${detail ? `: ${detail}` : ''}`,
      { status: response.status },
    )
  }

  return response
}

/**
 * Performs a request and decodes the JSON body with `schema`.
 *
 * @throws SyncError DecodingError when the body is not JSON or does not match
 */
export async function requestJson<T extends z.ZodTypeAny>(
  url: string,
  schema: T,
  options: RequestOptions,
): Promise<z.output<T>> {
  const response = await sendRequest(url, options)
  const text = await readBody(response, url)

  let payload: unknown
  try {
    payload = text.length === 0 ? null : JSON.parse(text)
  } catch (error) {
    throw decodingError(`Invalid JSON from ${redactUrl(url)}`, error)
  }

  const parsed = schema.safeParse(payload)
  if (!parsed.success) {
    throw decodingError(
      `Unexpected response from ${redactUrl(url)}: ${parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '<root>'} ${issue.message}`)
        .join('; ')}`,
      parsed.error,
    )
  }
  return parsed.data
}

/**
 * Reads a body as text, mapping a dropped connection to NetworkError
 */
export async function readBody(response: Response, url: string): Promise<string> {
  try {
    return await response.text()
  } catch (error) {
    throw networkError(`Failed reading response from ${redactUrl(url)}`, error)
  }
}

async function readErrorDetail(response: Response): Promise<string | null> {
  const text = await response.text().catch(() => '')
  if (!text) return null

  const data = parseJsonOrNull(text)
  if (typeof data === 'object' && data !== null) {
    if ('message' in data && typeof data.message === 'string') {
      return data.message
    }
    if ('error' in data && typeof data.error === 'string') {
      return data.error
    }
  }
  return text.slice(0, 200)
}

function parseJsonOrNull(text: string): unknown {
  try {
    return JSON.parse(text)
  } catch {
    return null
  }
}

/**
 * Strips credentials embedded in a URL before it reaches a log line
 */
export function redactUrl(url: string): string {
  try {
    const parsed = new URL(url)
    if (parsed.password) parsed.password = 'REDACTED'
    for (const key of ['apiKey', 'token']) {
      if (parsed.searchParams.has(key)) parsed.searchParams.set(key, 'REDACTED')
    }
    return parsed.toString()
  } catch {
    return url
  }
}

/**
 * Joins a server base URL and a path, tolerating trailing slashes
 */
export function joinUrl(base: string, path: string): string {
  return `${base.replace(/\/+$/, '')}${path.startsWith('/') ? path : `/${path}`}`
}
