/**
 * Error taxonomy for AnkiConnect calls.
 *
 * Every failure the client can produce from outside input is one of these
 * classes. They are terminal for the call that raised them; retry policy is
 * left to the caller (see `classifyError`).
 */

export type AnkiErrorKind =
  | 'remote_rejected'
  | 'no_data_found'
  | 'transport'
  | 'malformed_response'
  | 'invalid_identifier'
  | 'validation_failed'
  | 'missing_media_source'
  | 'io'

export type ErrorClass = 'transient' | 'permanent' | 'invalid'

export abstract class AnkiConnectError extends Error {
  abstract readonly kind: AnkiErrorKind

  constructor(message: string) {
    super(message)
    this.name = new.target.name
  }
}

/**
 * The service answered with a non-null `error` string.
 * The text is kept exactly as AnkiConnect sent it.
 */
export class RemoteRejectedError extends AnkiConnectError {
  readonly kind = 'remote_rejected' as const

  constructor(readonly remoteMessage: string) {
    super(remoteMessage)
  }
}

export class NoDataFoundError extends AnkiConnectError {
  readonly kind = 'no_data_found' as const

  constructor(readonly action?: string) {
    super(action ? `No data found for ${action}.` : 'No data found for query.')
  }
}

export interface TransportErrorDetails {
  /** HTTP status, when the server answered */
  status?: number
  /** Node/axios error code (ECONNREFUSED, ECONNABORTED, ...) */
  code?: string
  url?: string
}

export class TransportError extends AnkiConnectError {
  readonly kind = 'transport' as const
  readonly status?: number
  readonly code?: string
  readonly url?: string

  constructor(message: string, details: TransportErrorDetails = {}) {
    super(message)
    this.status = details.status
    this.code = details.code
    this.url = details.url
  }
}

/**
 * The response body did not decode into the expected shape.
 *
 * Keeps the raw value and the decoder diagnostic so protocol drift can be
 * debugged without repeating the call.
 */
export class MalformedResponseError extends AnkiConnectError {
  readonly kind = 'malformed_response' as const

  constructor(
    readonly expectedShape: string,
    readonly receivedValue: unknown,
    readonly diagnostic: string,
    readonly issues: ReadonlyArray<{ path: ReadonlyArray<string | number>; message: string }> = []
  ) {
    super(`Malformed response: expected ${expectedShape}. ${diagnostic}`)
  }
}

export class InvalidIdentifierError extends AnkiConnectError {
  readonly kind = 'invalid_identifier' as const

  constructor(readonly raw: unknown) {
    super(`Invalid identifier: ${describeRaw(raw)}`)
  }
}

export class ValidationFailedError extends AnkiConnectError {
  readonly kind = 'validation_failed' as const

  constructor(readonly fieldName: string, detail?: string) {
    super(detail ? `Validation failed for ${fieldName}: ${detail}` : `Validation failed: ${fieldName} is missing or empty`)
  }
}

export class MissingMediaSourceError extends AnkiConnectError {
  readonly kind = 'missing_media_source' as const

  constructor(readonly filename: string) {
    super(`No data, url or path supplied for media "${filename}"`)
  }
}

export interface IoErrorDetails {
  path?: string
  code?: string
}

export class IoError extends AnkiConnectError {
  readonly kind = 'io' as const
  readonly path?: string
  readonly code?: string

  constructor(message: string, details: IoErrorDetails = {}) {
    super(message)
    this.path = details.path
    this.code = details.code
  }
}

export function isAnkiConnectError(value: unknown): value is AnkiConnectError {
  return value instanceof AnkiConnectError
}

/**
 * Classifies an error for callers that own a retry policy.
 *
 * @example
 * classifyError(new TransportError('connect ECONNREFUSED')) // 'transient'
 * classifyError(new RemoteRejectedError('deck was not found')) // 'permanent'
 */
export function classifyError(error: unknown): ErrorClass {
  if (!isAnkiConnectError(error)) {
    return 'invalid'
  }

  switch (error.kind) {
    case 'transport':
    case 'io':
      return 'transient'
    case 'remote_rejected':
    case 'no_data_found':
      return 'permanent'
    case 'malformed_response':
    case 'invalid_identifier':
    case 'validation_failed':
    case 'missing_media_source':
      return 'invalid'
  }
}

/**
 * Message for display, with a hint on what to check next.
 */
export function getUserFriendlyError(error: unknown): string {
  if (!isAnkiConnectError(error)) {
    const message = error instanceof Error ? error.message : String(error)
    return `Unexpected error: ${message}`
  }

  switch (error.kind) {
    case 'transport':
      if (!(error instanceof TransportError)) {
        return error.message
      }
      if (error.code === 'ECONNREFUSED') {
        return `${error.message}. Is Anki running with the AnkiConnect add-on installed?`
      }
      if (error.code === 'ECONNABORTED') {
        return `${error.message}. AnkiConnect did not answer in time; Anki may be busy or showing a dialog.`
      }
      return `${error.message}. Check the AnkiConnect address and your network connection.`
    case 'io':
      return `${error.message}. Check that the file exists and is readable.`
    case 'malformed_response':
      return `${error.message}. The AnkiConnect version may not match the configured protocol version.`
    case 'remote_rejected':
    case 'no_data_found':
    case 'invalid_identifier':
    case 'validation_failed':
    case 'missing_media_source':
      return error.message
  }
}

function describeRaw(raw: unknown): string {
  if (typeof raw === 'string') return JSON.stringify(raw)
  if (typeof raw === 'bigint') return `${raw}n`
  return String(raw)
}
