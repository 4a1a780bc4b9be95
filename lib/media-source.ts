/**
 * Media Source Resolver
 *
 * A media payload can be given as inline bytes, a URL to download or a local
 * file to read. All three are resolved to bytes here, before the note is sent,
 * so AnkiConnect never has to fetch anything itself.
 */

import { existsSync } from 'fs'
import { readFile } from 'fs/promises'
import { resolve } from 'path'
import type { Transport } from './transport.js'
import { IoError, TransportError, ValidationFailedError, isAnkiConnectError } from './errors.js'

// ============================================
// TYPES
// ============================================

/**
 * Local path checked to exist when it was created.
 */
export class MediaPath {
  private constructor(readonly value: string) {}

  /**
   * @throws {IoError} when nothing exists at `path`
   */
  static from(path: string): MediaPath {
    const found = MediaPath.tryFrom(path)
    if (!found) {
      throw new IoError(`Path does not exist: ${path}`, { path, code: 'ENOENT' })
    }
    return found
  }

  static tryFrom(path: string): MediaPath | null {
    if (path.length === 0 || !existsSync(path)) {
      return null
    }
    return new MediaPath(resolve(path))
  }

  toString(): string {
    return this.value
  }
}

export type MediaSource =
  | { kind: 'data'; bytes: Uint8Array }
  | { kind: 'url'; url: string }
  | { kind: 'path'; path: MediaPath }

/**
 * Holder state for a source that has been moved out. Only used while a
 * builder hands its media over; never produced by the constructors below.
 */
export type EmptySource = { kind: 'empty' }

export type SourceSlot = MediaSource | EmptySource

export const EMPTY_SOURCE: EmptySource = Object.freeze({ kind: 'empty' })

/** Mutable slot a source can be moved out of */
export interface SourceHolder {
  source: SourceSlot
}

export interface ResolveOptions {
  signal?: AbortSignal
  quiet?: boolean
}

// ============================================
// CONSTRUCTORS
// ============================================

/**
 * Validates if a string is an HTTP/HTTPS URL.
 *
 * @example
 * isValidUrl('https://example.com/a.mp3') // true
 * isValidUrl('ftp://example.com') // false
 * isValidUrl('plain text') // false
 */
export function isValidUrl(url: string): boolean {
  try {
    const parsed = new URL(url)
    return parsed.protocol === 'http:' || parsed.protocol === 'https:'
  } catch {
    return false
  }
}

export function mediaSourceFromBytes(bytes: Uint8Array): MediaSource {
  return { kind: 'data', bytes }
}

/**
 * @throws {ValidationFailedError} when `url` is not an HTTP/HTTPS URL
 */
export function mediaSourceFromUrl(url: string): MediaSource {
  if (!isValidUrl(url)) {
    throw new ValidationFailedError('url', `not an http(s) URL: ${url}`)
  }
  return { kind: 'url', url: new URL(url).toString() }
}

/**
 * @throws {IoError} when the path does not exist
 */
export function mediaSourceFromPath(path: string): MediaSource {
  return { kind: 'path', path: MediaPath.from(path) }
}

/**
 * Interprets a free-form string as a media source.
 *
 * Tried in this order, first match wins:
 * 1. an existing local path
 * 2. anything `URL` parses, whatever the scheme (fetching a non-http URL
 *    fails later with TransportError)
 * 3. the string's own UTF-8 bytes
 *
 * @example
 * mediaSourceFromString('./local.txt') // { kind: 'path', ... } when the file exists
 * mediaSourceFromString('https://example.com/a.mp3') // { kind: 'url', ... }
 * mediaSourceFromString('plain text') // { kind: 'data', bytes: <plain text> }
 */
export function mediaSourceFromString(value: string): MediaSource {
  const path = MediaPath.tryFrom(value)
  if (path) {
    return { kind: 'path', path }
  }
  const url = parseUrl(value)
  if (url) {
    return { kind: 'url', url }
  }
  return { kind: 'data', bytes: new TextEncoder().encode(value) }
}

function parseUrl(value: string): string | null {
  try {
    return new URL(value).toString()
  } catch {
    return null
  }
}

export function toMediaSource(value: MediaSource | string): MediaSource {
  return typeof value === 'string' ? mediaSourceFromString(value) : value
}

/**
 * Moves the source out of `holder`, leaving it empty.
 * Returns undefined when the holder was already empty.
 */
export function takeMediaSource(holder: SourceHolder): MediaSource | undefined {
  const source = holder.source
  holder.source = EMPTY_SOURCE
  return source.kind === 'empty' ? undefined : source
}

// ============================================
// RESOLUTION
// ============================================

/**
 * Resolves a source to its bytes.
 *
 * - `data`: a copy of the bytes, no I/O
 * - `url`: one GET through `transport`
 * - `path`: the whole file
 *
 * @throws {TransportError} when the download fails
 * @throws {IoError} when the file cannot be read
 */
export async function resolveMediaSource(
  source: SourceSlot,
  transport: Transport,
  options: ResolveOptions = {}
): Promise<Uint8Array> {
  switch (source.kind) {
    case 'data':
      return new Uint8Array(source.bytes)

    case 'url': {
      if (!options.quiet) {
        console.log(`[MediaSource] Downloading from URL: ${source.url}`)
      }
      try {
        return await transport.getBytes(source.url, { signal: options.signal })
      } catch (error: unknown) {
        if (isAnkiConnectError(error)) throw error
        const message = error instanceof Error ? error.message : String(error)
        throw new TransportError(`Download of ${source.url} failed: ${message}`, { url: source.url })
      }
    }

    case 'path': {
      if (!options.quiet) {
        console.log(`[MediaSource] Reading from path: ${source.path.value}`)
      }
      try {
        const buffer = await readFile(source.path.value, { signal: options.signal })
        return new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength)
      } catch (error: unknown) {
        throw toIoError(error, source.path.value)
      }
    }

    case 'empty':
      throw new Error('Invariant violated: attempted to resolve a media source that was already moved out')

    default: {
      const unreachable: never = source
      throw new Error(`Unknown media source: ${JSON.stringify(unreachable)}`)
    }
  }
}

function toIoError(error: unknown, path: string): IoError {
  const message = error instanceof Error ? error.message : String(error)
  const code = typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string'
    ? error.code
    : undefined
  return new IoError(`Could not read ${path}: ${message}`, { path, code })
}
