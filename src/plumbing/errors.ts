/**
 * Error kinds shared by the store, the adapters, the controller and every
 * command surface. Surfaces translate `kind` to their own response shape and
 * never reinterpret it.
 */

export type LifecycleErrorKind =
  | 'validation'
  | 'not_found'
  | 'conflict'
  | 'adapter_unavailable'

export class LifecycleError extends Error {
  readonly kind: LifecycleErrorKind

  constructor(kind: LifecycleErrorKind, message: string, options?: ErrorOptions) {
    super(message, options)
    this.kind = kind
    this.name = new.target.name
  }
}

export class ValidationError extends LifecycleError {
  constructor(message: string) {
    super('validation', message)
  }
}

export class NotFoundError extends LifecycleError {
  constructor(message: string) {
    super('not_found', message)
  }
}

export class ConflictError extends LifecycleError {
  constructor(message: string) {
    super('conflict', message)
  }
}

/** Transient: the caller may retry. */
export class AdapterUnavailableError extends LifecycleError {
  constructor(message: string, options?: ErrorOptions) {
    super('adapter_unavailable', message, options)
  }
}

export const isLifecycleError = (error: unknown): error is LifecycleError =>
  error instanceof LifecycleError

/** Node system errors carry a string code such as ENOENT */
export const hasErrorCode = (error: unknown, code: string): boolean =>
  error instanceof Error && 'code' in error && error.code === code
