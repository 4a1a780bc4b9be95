/**
 * Entity Builder
 *
 * `NoteBuilder` collects note values in any order, then `build()` checks the
 * required ones, resolves every media payload and hands back a frozen `Note`.
 * A build that fails part way never produces a note.
 */

import type { Transport } from './transport.js'
import type { Note, NoteOptions } from '../types/note.js'
import { TransportError, ValidationFailedError } from './errors.js'
import { FieldMap } from './field-map.js'
import { resolveMedia, type Media, type MediaKind } from './media.js'

export interface BuildOptions {
  /** Cancels outstanding downloads and file reads */
  signal?: AbortSignal
  /** Media items resolved at the same time (default: 4) */
  concurrency?: number
  quiet?: boolean
}

export type FieldsInput =
  | ReadonlyMap<string, string>
  | Readonly<Record<string, string>>
  | Iterable<readonly [string, string]>

const DEFAULT_CONCURRENCY = 4

interface MediaSlot {
  kind: MediaKind
  index: number
  media: Media
}

export class NoteBuilder {
  private stagedDeckName?: string
  private stagedModelName?: string
  private stagedFields?: Map<string, string>
  private stagedOptions?: NoteOptions
  private stagedTags?: string[]
  private stagedAudios?: Media[]
  private stagedVideos?: Media[]
  private stagedPictures?: Media[]

  deckName(name: string): this {
    this.stagedDeckName = name
    return this
  }

  modelName(name: string): this {
    this.stagedModelName = name
    return this
  }

  /** Adds or replaces one field, keeping first-insertion order */
  field(name: string, value: string): this {
    if (!this.stagedFields) {
      this.stagedFields = new Map()
    }
    this.stagedFields.set(name, value)
    return this
  }

  /** Replaces all staged fields */
  fields(fields: FieldsInput): this {
    this.stagedFields = new Map(toEntries(fields))
    return this
  }

  options(options: NoteOptions): this {
    this.stagedOptions = options
    return this
  }

  tags(tags: Iterable<string>): this {
    this.stagedTags = Array.from(tags)
    return this
  }

  tag(tag: string): this {
    this.stagedTags = [...(this.stagedTags ?? []), tag]
    return this
  }

  audios(items: Iterable<Media>): this {
    this.stagedAudios = Array.from(items)
    return this
  }

  audio(item: Media): this {
    this.stagedAudios = [...(this.stagedAudios ?? []), item]
    return this
  }

  videos(items: Iterable<Media>): this {
    this.stagedVideos = Array.from(items)
    return this
  }

  video(item: Media): this {
    this.stagedVideos = [...(this.stagedVideos ?? []), item]
    return this
  }

  pictures(items: Iterable<Media>): this {
    this.stagedPictures = Array.from(items)
    return this
  }

  picture(item: Media): this {
    this.stagedPictures = [...(this.stagedPictures ?? []), item]
    return this
  }

  /**
   * Validates, resolves media and returns the finished note.
   *
   * Required values are checked in the order deckName, modelName, fields.
   * Once they pass, the staged values are moved out of the builder, so it is
   * empty afterwards whether or not media resolution succeeds.
   *
   * @throws {ValidationFailedError} naming the first missing or empty required value
   * @throws {MissingMediaSourceError} for a media item with no url, path or data
   * @throws {TransportError} / {IoError} from media resolution
   *
   * @example
   * const note = await new NoteBuilder()
   *   .deckName('Default')
   *   .modelName('Basic')
   *   .field('Front', 'hello')
   *   .field('Back', 'world')
   *   .build(transport)
   */
  async build(transport: Transport, options: BuildOptions = {}): Promise<Note> {
    const deckName = this.stagedDeckName
    if (deckName === undefined || deckName.length === 0) {
      throw new ValidationFailedError('deckName')
    }
    const modelName = this.stagedModelName
    if (modelName === undefined || modelName.length === 0) {
      throw new ValidationFailedError('modelName')
    }
    const fields = this.stagedFields
    if (fields === undefined || fields.size === 0) {
      throw new ValidationFailedError('fields')
    }

    const staged = {
      options: this.stagedOptions,
      tags: this.stagedTags,
      audios: this.stagedAudios,
      videos: this.stagedVideos,
      pictures: this.stagedPictures
    }
    this.reset()

    const resolved = await resolveAllMedia(
      [
        ...toSlots('audio', staged.audios),
        ...toSlots('video', staged.videos),
        ...toSlots('picture', staged.pictures)
      ],
      transport,
      options
    )

    const note: Note = {
      deckName,
      modelName,
      fields: new FieldMap(fields),
      ...(staged.options !== undefined ? { options: Object.freeze({ ...staged.options }) } : {}),
      ...(staged.tags !== undefined ? { tags: Object.freeze(staged.tags) } : {}),
      ...(staged.audios !== undefined ? { audios: Object.freeze(pick(resolved, 'audio', staged.audios)) } : {}),
      ...(staged.videos !== undefined ? { videos: Object.freeze(pick(resolved, 'video', staged.videos)) } : {}),
      ...(staged.pictures !== undefined ? { pictures: Object.freeze(pick(resolved, 'picture', staged.pictures)) } : {})
    }

    return Object.freeze(note)
  }

  private reset(): void {
    this.stagedDeckName = undefined
    this.stagedModelName = undefined
    this.stagedFields = undefined
    this.stagedOptions = undefined
    this.stagedTags = undefined
    this.stagedAudios = undefined
    this.stagedVideos = undefined
    this.stagedPictures = undefined
  }
}

function toEntries(fields: FieldsInput): Iterable<readonly [string, string]> {
  if (isIterable(fields)) {
    return fields
  }
  return Object.entries(fields)
}

function isIterable(value: object): value is Iterable<readonly [string, string]> {
  return Symbol.iterator in value
}

function toSlots(kind: MediaKind, items: Media[] | undefined): MediaSlot[] {
  return (items ?? []).map((media, index) => ({ kind, index, media }))
}

function slotKey(kind: MediaKind, index: number): string {
  return `${kind}:${index}`
}

function pick(resolved: Map<string, Media>, kind: MediaKind, originals: Media[]): Media[] {
  return originals.map((original, index) => resolved.get(slotKey(kind, index)) ?? original)
}

/**
 * Resolves media items in batches of `concurrency`.
 *
 * Items are independent, so a batch runs with Promise.all. The first failure
 * aborts the shared controller, which cancels the sibling downloads and reads
 * still in flight, and the whole resolution rejects.
 */
async function resolveAllMedia(
  slots: MediaSlot[],
  transport: Transport,
  options: BuildOptions
): Promise<Map<string, Media>> {
  const resolved = new Map<string, Media>()
  if (slots.length === 0) {
    return resolved
  }

  const concurrency = Math.max(1, Math.floor(options.concurrency ?? DEFAULT_CONCURRENCY))
  const controller = new AbortController()
  const onCallerAbort = () => controller.abort(options.signal?.reason)
  if (options.signal?.aborted) {
    controller.abort(options.signal.reason)
  } else {
    options.signal?.addEventListener('abort', onCallerAbort, { once: true })
  }

  if (!options.quiet) {
    console.log(`[NoteBuilder] Resolving ${slots.length} media item(s), ${concurrency} at a time`)
  }

  try {
    for (let i = 0; i < slots.length; i += concurrency) {
      if (controller.signal.aborted) {
        throw new TransportError('Media resolution was cancelled', { code: 'ERR_CANCELED' })
      }

      const batch = slots.slice(i, i + concurrency)
      const batchPromises = batch.map(async (slot) => {
        try {
          const media = await resolveMedia(slot.media, transport, {
            signal: controller.signal,
            quiet: options.quiet
          })
          resolved.set(slotKey(slot.kind, slot.index), media)
        } catch (error: unknown) {
          controller.abort(error)
          throw error
        }
      })
      await Promise.all(batchPromises)
    }
  } finally {
    options.signal?.removeEventListener('abort', onCallerAbort)
  }

  return resolved
}
