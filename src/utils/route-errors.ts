import { STATUS_CODES } from 'node:http'
import type { ErrorResponse } from '@root/schemas/common/error.schema.js'
import { isSyncError, type SyncErrorKind } from '@root/types/errors.js'
import type { FastifyBaseLogger, FastifyReply, FastifyRequest } from 'fastify'

const STATUS_FOR_KIND: Record<SyncErrorKind, number> = {
  NoSession: 401,
  NotFound: 404,
  Conflict: 409,
  ValidationError: 400,
  NetworkError: 502,
  DecodingError: 502,
  LocalStoreError: 500,
}

export function statusForSyncErrorKind(kind: SyncErrorKind): number {
  return STATUS_FOR_KIND[kind]
}

/**
 * Logs a failed request without query string or body, which may carry
 * credentials.
 */
export function logRouteError(
  log: FastifyBaseLogger,
  request: FastifyRequest,
  error: unknown,
  context: { message: string } & Record<string, unknown>,
): void {
  const { message, ...extra } = context
  log.error(
    {
      error,
      ...(isSyncError(error) ? { kind: error.kind } : {}),
      ...extra,
      request: {
        id: request.id,
        method: request.method,
        path: request.url.split('?')[0],
        route: request.routeOptions?.url,
      },
    },
    message,
  )
}

/**
 * Builds the error payload for an error a route caught
 */
export function toErrorResponse(error: unknown, fallback: string): ErrorResponse {
  if (isSyncError(error)) {
    const statusCode = statusForSyncErrorKind(error.kind)
    const isServerError = statusCode === 500
    return {
      statusCode,
      code: error.kind,
      error: STATUS_CODES[statusCode] ?? 'Error',
      message: isServerError ? fallback : error.message || fallback,
    }
  }
  return {
    statusCode: 500,
    code: 'GENERIC_ERROR',
    error: 'Internal Server Error',
    message: fallback,
  }
}

/**
 * Logs `error` and answers with the status its kind maps to
 */
export function sendRouteError(
  request: FastifyRequest,
  reply: FastifyReply,
  error: unknown,
  message: string,
): FastifyReply {
  logRouteError(request.log, request, error, { message })
  const payload = toErrorResponse(error, message)
  return reply.code(payload.statusCode).send(payload)
}
