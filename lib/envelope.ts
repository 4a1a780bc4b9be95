/**
 * Request Envelope Codec
 *
 * Every AnkiConnect call goes through `EnvelopeCodec.send`:
 * 1. build `{action, version, params?}` (params omitted, never null)
 * 2. POST it through the transport
 * 3. parse the body as an untyped value
 * 4. drop empty placeholder objects from a `result` array
 * 5. check the `{result, error}` envelope, reject on a non-null error
 * 6. decode `result` with the caller's zod schema
 */

import { z } from 'zod'
import type { Transport } from './transport.js'
import {
  MalformedResponseError,
  RemoteRejectedError,
  TransportError,
  ValidationFailedError,
  isAnkiConnectError
} from './errors.js'

// ============================================
// TYPES
// ============================================

export interface RequestEnvelope<P = unknown> {
  action: string
  version: number
  params?: P
}

export interface ResponseEnvelope {
  result?: unknown
  error?: string | null
}

export interface EnvelopeCodecOptions {
  /** AnkiConnect endpoint, e.g. http://127.0.0.1:8765 */
  endpoint: string
  /** Protocol version sent with every envelope */
  version: number
  transport: Transport
  /** Suppress progress logging */
  quiet?: boolean
}

export interface SendOptions {
  signal?: AbortSignal
  /** Name of the expected result type, used in MalformedResponseError */
  expectedShape?: string
}

const ResponseEnvelopeSchema = z.object({
  result: z.unknown(),
  error: z.string().nullish()
})

// ============================================
// PURE HELPERS
// ============================================

/**
 * Builds the outbound envelope. `params` is left off entirely when undefined
 * so it never reaches the wire as `null`.
 */
export function buildEnvelope<P>(action: string, version: number, params?: P): RequestEnvelope<P> {
  if (action.trim().length === 0) {
    throw new ValidationFailedError('action')
  }
  if (!Number.isInteger(version) || version < 1) {
    throw new ValidationFailedError('version', `expected a positive integer, got ${version}`)
  }

  const envelope: RequestEnvelope<P> = { action, version }
  if (params !== undefined) {
    envelope.params = params
  }
  return envelope
}

function isEmptyPlainObject(value: unknown): boolean {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && Object.keys(value).length === 0
}

/**
 * Removes `{}` elements from a result array. Everything else, including
 * non-empty objects, nested arrays and nulls, is kept in order.
 *
 * @example
 * dropEmptyObjects([1, {}, { a: 1 }, [], null]) // [1, { a: 1 }, [], null]
 */
export function dropEmptyObjects(items: readonly unknown[]): unknown[] {
  return items.filter(item => !isEmptyPlainObject(item))
}

/**
 * Applies the empty-object rule to the top-level `result` of a parsed body.
 * Returns the input unchanged when `result` is not an array.
 */
export function sanitizeEnvelope(body: unknown): unknown {
  if (typeof body !== 'object' || body === null || Array.isArray(body) || !('result' in body)) {
    return body
  }
  const { result } = body
  if (!Array.isArray(result)) {
    return body
  }
  return { ...body, result: dropEmptyObjects(result) }
}

export function parseEnvelopeText(text: string): unknown {
  try {
    return JSON.parse(text)
  } catch (error: unknown) {
    const diagnostic = error instanceof Error ? error.message : String(error)
    throw new MalformedResponseError('JSON envelope', text, `Body is not valid JSON: ${diagnostic}`)
  }
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ')
}

function toMalformed(expectedShape: string, received: unknown, error: z.ZodError): MalformedResponseError {
  return new MalformedResponseError(
    expectedShape,
    received,
    formatIssues(error),
    error.issues.map(issue => ({ path: issue.path, message: issue.message }))
  )
}

/**
 * Decodes a parsed (and sanitized) response body.
 *
 * A non-null `error` always wins: the call is rejected with the service text
 * even when `result` is also filled in. A missing `result` is decoded as `null`.
 *
 * @throws {MalformedResponseError} when the body is not an envelope or `result`
 * does not match `resultSchema`
 * @throws {RemoteRejectedError} when the service reported an error
 */
export function decodeEnvelope<S extends z.ZodTypeAny>(
  body: unknown,
  resultSchema: S,
  expectedShape = 'result'
): z.output<S> {
  const envelope = ResponseEnvelopeSchema.safeParse(body)
  if (!envelope.success) {
    throw toMalformed(`{ result: ${expectedShape}, error: string | null }`, body, envelope.error)
  }

  const { error } = envelope.data
  if (error !== null && error !== undefined) {
    throw new RemoteRejectedError(error)
  }

  const raw = envelope.data.result === undefined ? null : envelope.data.result
  const decoded = resultSchema.safeParse(raw)
  if (!decoded.success) {
    throw toMalformed(expectedShape, body, decoded.error)
  }
  return decoded.data
}

// ============================================
// CODEC
// ============================================

export class EnvelopeCodec {
  private readonly endpoint: string
  private readonly transport: Transport
  private readonly quiet: boolean
  readonly version: number

  constructor(options: EnvelopeCodecOptions) {
    this.endpoint = options.endpoint
    this.transport = options.transport
    this.version = options.version
    this.quiet = options.quiet ?? false
  }

  /**
   * Sends one action and decodes its result.
   *
   * @example
   * const ids = await codec.send('findNotes', z.array(z.number()), { query: 'deck:Default' })
   */
  async send<S extends z.ZodTypeAny, P = undefined>(
    action: string,
    resultSchema: S,
    params?: P,
    options: SendOptions = {}
  ): Promise<z.output<S>> {
    const envelope = buildEnvelope(action, this.version, params)

    if (!this.quiet) {
      console.log(`[AnkiConnect] -> ${action}`)
    }

    let text: string
    try {
      text = await this.transport.postJson(this.endpoint, envelope, { signal: options.signal })
    } catch (error: unknown) {
      if (isAnkiConnectError(error)) throw error
      const message = error instanceof Error ? error.message : String(error)
      throw new TransportError(`Request to ${this.endpoint} failed: ${message}`, { url: this.endpoint })
    }
    const parsed = parseEnvelopeText(text)
    const sanitized = sanitizeEnvelope(parsed)

    if (sanitized !== parsed && !this.quiet) {
      const before = countResultItems(parsed)
      const after = countResultItems(sanitized)
      if (before !== after) {
        console.warn(`[AnkiConnect] ${action}: dropped ${before - after} empty placeholder record(s) from result`)
      }
    }

    return decodeEnvelope(sanitized, resultSchema, options.expectedShape ?? action)
  }
}

function countResultItems(body: unknown): number {
  if (typeof body === 'object' && body !== null && 'result' in body && Array.isArray(body.result)) {
    return body.result.length
  }
  return 0
}
