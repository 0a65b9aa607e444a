export type InstallationAuthErrorKind =
  | 'signing'
  | 'header-encoding'
  | 'request'
  | 'time'
  | 'invalid-parameters'

/**
 * Base class for every failure raised while issuing or refreshing an
 * installation credential. Narrow on `kind` to find the origin; the
 * underlying library error, when there is one, is kept as `cause`.
 */
export abstract class InstallationAuthError extends Error {
  abstract readonly kind: InstallationAuthErrorKind

  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause })
    this.name = new.target.name
  }
}

export class SigningError extends InstallationAuthError {
  readonly kind = 'signing'
}

export class HeaderEncodingError extends InstallationAuthError {
  readonly kind = 'header-encoding'
}

export class TimeError extends InstallationAuthError {
  readonly kind = 'time'
}

export class RequestError extends InstallationAuthError {
  readonly kind = 'request'
  readonly status?: number
  readonly body?: unknown

  constructor(params: { message: string; status?: number; body?: unknown; cause?: unknown }) {
    super(params.message, params.cause)
    this.status = params.status
    this.body = params.body
  }
}

export class InvalidParametersError extends InstallationAuthError {
  readonly kind = 'invalid-parameters'
  readonly issues: string[]

  constructor(issues: string[], cause?: unknown) {
    super(`Invalid installation auth parameters: ${issues.join('; ')}`, cause)
    this.issues = issues
  }
}

export type AnyInstallationAuthError =
  | SigningError
  | HeaderEncodingError
  | TimeError
  | RequestError
  | InvalidParametersError

export function isInstallationAuthError(value: unknown): value is AnyInstallationAuthError {
  return value instanceof InstallationAuthError
}
