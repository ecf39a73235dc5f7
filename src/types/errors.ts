/**
 * Error taxonomy shared by the remote adapters, the feed fetcher, the local
 * store and the sync orchestrator.
 */

export type SyncErrorKind =
  | 'NoSession'
  | 'NetworkError'
  | 'Conflict'
  | 'NotFound'
  | 'ValidationError'
  | 'DecodingError'
  | 'LocalStoreError'

export class SyncError extends Error {
  /** HTTP status of the remote response, when the error came from one */
  readonly status: number | undefined

  constructor(
    public readonly kind: SyncErrorKind,
    message: string,
    options?: { status?: number; cause?: unknown },
  ) {
    super(message, { cause: options?.cause })
    this.name = 'SyncError'
    this.status = options?.status

    // Fix prototype chain – important after TS → JS down-emit
    Object.setPrototypeOf(this, new.target.prototype)

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SyncError)
    }
  }
}

export const noSession = (message = 'No authenticated session') =>
  new SyncError('NoSession', message)

export const networkError = (message: string, cause?: unknown) =>
  new SyncError('NetworkError', message, { cause })

export const decodingError = (message: string, cause?: unknown) =>
  new SyncError('DecodingError', message, { cause })

export const localStoreError = (message: string, cause?: unknown) =>
  new SyncError('LocalStoreError', message, { cause })

export const validationError = (message: string, cause?: unknown) =>
  new SyncError('ValidationError', message, { cause })

export function isSyncError(error: unknown): error is SyncError {
  return error instanceof SyncError
}

/**
 * Maps an HTTP status to an error kind.
 *
 * 401/403 reject the session. 5xx and 429 are treated as the server being
 * unreachable for this pass.
 */
export function kindForStatus(status: number): SyncErrorKind {
  if (status === 401 || status === 403) return 'NoSession'
  if (status === 404) return 'NotFound'
  if (status === 409) return 'Conflict'
  if (status === 429 || status >= 500) return 'NetworkError'
  return 'ValidationError'
}

/**
 * Normalizes anything thrown into a SyncError.
 *
 * fetch rejects with a TypeError on connection failures and with a
 * DOMException named AbortError/TimeoutError when the signal fires.
 */
export function toSyncError(error: unknown, context?: string): SyncError {
  if (error instanceof SyncError) return error

  const prefix = context ? `${context}: ` : ''

  if (error instanceof Error) {
    if (error.name === 'ZodError' || error instanceof SyntaxError) {
      return decodingError(`${prefix}${error.message}`, error)
    }
    if (
      error.name === 'TimeoutError' ||
      error.name === 'AbortError' ||
      error instanceof TypeError
    ) {
      return networkError(`${prefix}${error.message}`, error)
    }
    if ('code' in error && typeof error.code === 'string') {
      if (error.code.startsWith('SQLITE_')) {
        return localStoreError(`${prefix}${error.message}`, error)
      }
      if (['ECONNREFUSED', 'ECONNRESET', 'ENOTFOUND', 'ETIMEDOUT'].includes(error.code)) {
        return networkError(`${prefix}${error.message}`, error)
      }
    }
    return networkError(`${prefix}${error.message}`, error)
  }

  return networkError(`${prefix}${String(error)}`, error)
}

export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: SyncError }

/**
 * Runs an async operation and captures its failure as a value.
 */
export async function attempt<T>(
  fn: () => Promise<T>,
  context?: string,
): Promise<Result<T>> {
  try {
    return { ok: true, value: await fn() }
  } catch (error) {
    return { ok: false, error: toSyncError(error, context) }
  }
}
