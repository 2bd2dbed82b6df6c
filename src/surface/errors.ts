/**
 * One mapping from lifecycle error kinds to every surface's failure shape.
 */

import {
  isLifecycleError,
  type LifecycleErrorKind,
} from '../plumbing/errors.ts'
import { errorMessage, log } from '../plumbing/logger.ts'

export type SurfaceErrorKind = LifecycleErrorKind | 'internal'

export interface DescribedError {
  kind: SurfaceErrorKind
  message: string
}

export const HTTP_STATUS = {
  validation: 400,
  not_found: 404,
  conflict: 409,
  adapter_unavailable: 503,
  internal: 500,
} as const satisfies Record<SurfaceErrorKind, number>

export type ErrorStatus = (typeof HTTP_STATUS)[SurfaceErrorKind]

/** sysexits-style codes; 75 is EX_TEMPFAIL */
export const EXIT_CODES = {
  validation: 2,
  not_found: 3,
  conflict: 4,
  adapter_unavailable: 75,
  internal: 1,
} as const satisfies Record<SurfaceErrorKind, number>

const BOT_PREFIX: Record<SurfaceErrorKind, string> = {
  validation: 'Invalid request',
  not_found: 'Not found',
  conflict: 'Not allowed right now',
  adapter_unavailable: 'Service unavailable, try again later',
  internal: 'Something went wrong',
}

/**
 * Internal errors keep their message out of responses; it is logged instead.
 */
export const describeError = (error: unknown): DescribedError => {
  if (isLifecycleError(error)) {
    return { kind: error.kind, message: error.message }
  }
  log(
    { message: 'Unexpected error', error: errorMessage(error) },
    'error',
  )
  return { kind: 'internal', message: 'Internal error' }
}

const JSON_ERROR_HEADERS = {
  'Content-Type': 'application/json',
  'Cache-Control': 'no-store',
} as const

export const errorResponse = (error: unknown): Response => {
  const { kind, message } = describeError(error)
  return new Response(JSON.stringify({ error: message, kind }), {
    status: HTTP_STATUS[kind],
    headers: JSON_ERROR_HEADERS,
  })
}

export const exitCodeFor = (error: unknown): number =>
  EXIT_CODES[describeError(error).kind]

export const botErrorText = (error: unknown): string => {
  const { kind, message } = describeError(error)
  return kind === 'internal'
    ? BOT_PREFIX.internal
    : `${BOT_PREFIX[kind]}: ${message}`
}

export const isSurfaceErrorKind = (value: unknown): value is SurfaceErrorKind =>
  typeof value === 'string' && Object.hasOwn(HTTP_STATUS, value)
