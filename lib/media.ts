import type { Transport } from './transport.js'
import { MissingMediaSourceError, ValidationFailedError } from './errors.js'
import {
  EMPTY_SOURCE,
  resolveMediaSource,
  takeMediaSource,
  toMediaSource,
  type MediaSource,
  type ResolveOptions,
  type SourceHolder
} from './media-source.js'

/**
 * A media file attached to a note.
 *
 * `data` is filled in by `resolveMedia`; `url` and `path` say where it comes
 * from. `fields` names the note fields the file reference is appended to.
 */
export interface Media {
  readonly filename: string
  readonly data: Uint8Array
  readonly url?: MediaSource
  readonly path?: MediaSource
  readonly fields: readonly string[]
  readonly skipHash?: string
}

export type MediaKind = 'audio' | 'video' | 'picture'

/**
 * Stages a `Media` item.
 *
 * @example
 * const audio = new MediaBuilder()
 *   .filename('word.mp3')
 *   .fields(['Audio'])
 *   .url('https://example.com/word.mp3')
 *   .build()
 */
export class MediaBuilder {
  private stagedFilename?: string
  private stagedFields?: string[]
  private stagedData?: Uint8Array
  private readonly stagedUrl: SourceHolder = { source: EMPTY_SOURCE }
  private readonly stagedPath: SourceHolder = { source: EMPTY_SOURCE }
  private stagedSkipHash?: string

  filename(filename: string): this {
    this.stagedFilename = filename
    return this
  }

  fields(fields: Iterable<string>): this {
    this.stagedFields = Array.from(fields)
    return this
  }

  field(name: string): this {
    this.stagedFields = [...(this.stagedFields ?? []), name]
    return this
  }

  /** Inline bytes, used only when neither url nor path is set */
  data(bytes: Uint8Array): this {
    this.stagedData = bytes
    return this
  }

  /** Accepts a source or a free-form string (see `mediaSourceFromString`) */
  url(source: MediaSource | string): this {
    this.stagedUrl.source = toMediaSource(source)
    return this
  }

  path(source: MediaSource | string): this {
    this.stagedPath.source = toMediaSource(source)
    return this
  }

  skipHash(hash: string): this {
    this.stagedSkipHash = hash
    return this
  }

  /**
   * Moves the staged values into a `Media` item and clears the builder.
   *
   * @throws {ValidationFailedError} when `filename` or `fields` is missing or empty
   */
  build(): Media {
    const filename = this.stagedFilename
    if (filename === undefined || filename.trim().length === 0) {
      throw new ValidationFailedError('filename')
    }
    const fields = this.stagedFields
    if (fields === undefined || fields.length === 0) {
      throw new ValidationFailedError('fields')
    }

    const url = takeMediaSource(this.stagedUrl)
    const path = takeMediaSource(this.stagedPath)
    const media: Media = {
      filename,
      data: this.stagedData ?? new Uint8Array(0),
      fields,
      ...(url ? { url } : {}),
      ...(path ? { path } : {}),
      ...(this.stagedSkipHash !== undefined ? { skipHash: this.stagedSkipHash } : {})
    }

    this.stagedFilename = undefined
    this.stagedFields = undefined
    this.stagedData = undefined
    this.stagedSkipHash = undefined

    return Object.freeze(media)
  }
}

/**
 * Shorthand for a media item whose bytes are already in memory.
 */
export function inlineMedia(filename: string, bytes: Uint8Array, fields: readonly string[]): Media {
  return new MediaBuilder().filename(filename).fields(fields).data(bytes).build()
}

/**
 * Fills in `data` for one media item.
 *
 * Precedence: url source, then path source, then bytes already on the item.
 * Only the winning source is touched.
 *
 * @throws {MissingMediaSourceError} when no source is set and `data` is empty,
 * or when the resolved payload is empty
 */
export async function resolveMedia(media: Media, transport: Transport, options: ResolveOptions = {}): Promise<Media> {
  let data: Uint8Array
  if (media.url) {
    data = await resolveMediaSource(media.url, transport, options)
  } else if (media.path) {
    data = await resolveMediaSource(media.path, transport, options)
  } else if (media.data.length > 0) {
    return media
  } else {
    throw new MissingMediaSourceError(media.filename)
  }

  if (data.length === 0) {
    throw new MissingMediaSourceError(media.filename)
  }
  return Object.freeze({ ...media, data })
}
