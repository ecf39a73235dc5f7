/**
 * Error Policy
 *
 * Maps each sync error kind to what a pass does about it. `boundary` is a
 * phase's opening read from the server; `record` is anything done for a
 * single subscription, episode, action or collection entry.
 */
import {
  type Result,
  type SyncError,
  type SyncErrorKind,
  toSyncError,
} from '@root/types/errors.js'
import type { FastifyBaseLogger } from 'fastify'

export type ErrorScope = 'boundary' | 'record'

export type ErrorAction =
  | 'abortPass'
  | 'skipPhase'
  | 'skipRecord'
  | 'treatAsSuccess'

export const ERROR_POLICY: Readonly<
  Record<SyncErrorKind, Readonly<Record<ErrorScope, ErrorAction>>>
> = {
  NoSession: { boundary: 'abortPass', record: 'abortPass' },
  LocalStoreError: { boundary: 'abortPass', record: 'abortPass' },
  NetworkError: { boundary: 'abortPass', record: 'skipRecord' },
  DecodingError: { boundary: 'abortPass', record: 'skipRecord' },
  NotFound: { boundary: 'skipPhase', record: 'skipRecord' },
  ValidationError: { boundary: 'skipPhase', record: 'skipRecord' },
  Conflict: { boundary: 'skipPhase', record: 'treatAsSuccess' },
}

export function policyFor(error: SyncError, scope: ErrorScope): ErrorAction {
  return ERROR_POLICY[error.kind][scope]
}

export type RecordOutcome = 'success' | 'skipped'

/**
 * Applies the record policy to a failed operation.
 *
 * @throws SyncError when the policy aborts the pass
 */
export function handleRecordError(
  error: unknown,
  log: FastifyBaseLogger,
  context: Record<string, unknown>,
  message: string,
): RecordOutcome {
  const syncError = toSyncError(error)
  switch (policyFor(syncError, 'record')) {
    case 'abortPass':
      throw syncError
    case 'treatAsSuccess':
      log.debug({ ...context, kind: syncError.kind }, `${message}: treated as success`)
      return 'success'
    default:
      log.warn(
        { ...context, kind: syncError.kind, error: syncError },
        `${message}: skipped`,
      )
      return 'skipped'
  }
}

/**
 * Resolves a record-level result to its outcome, logging skips.
 *
 * @throws SyncError when the policy aborts the pass
 */
export function settleRecord<T>(
  result: Result<T>,
  log: FastifyBaseLogger,
  context: Record<string, unknown>,
  message: string,
): RecordOutcome {
  if (result.ok) return 'success'
  return handleRecordError(result.error, log, context, message)
}

/**
 * Resolves a phase's opening read. Returns null when the phase is to be
 * skipped.
 *
 * @throws SyncError when the policy aborts the pass
 */
export function settleBoundary<T>(
  result: Result<T>,
  log: FastifyBaseLogger,
  phase: string,
): T | null {
  if (result.ok) return result.value
  const action = policyFor(result.error, 'boundary')
  if (action === 'abortPass') throw result.error
  log.warn(
    { phase, kind: result.error.kind, error: result.error },
    `Server does not support the ${phase} phase, skipping it`,
  )
  return null
}
