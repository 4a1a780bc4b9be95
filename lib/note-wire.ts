import type { Note, NoteOptions } from '../types/note.js'
import type { Media } from './media.js'

/**
 * Media item as AnkiConnect expects it in `addNote(s)`: bytes as base64.
 * Sources are not sent; the bytes are already resolved.
 */
export interface MediaWire {
  filename: string
  data: string
  fields: string[]
  skipHash?: string
}

/**
 * Note as sent on the wire. Media lists use the singular keys `audio`,
 * `video` and `picture`; unset optionals are left out, never null.
 */
export interface NoteWire {
  deckName: string
  modelName: string
  fields: Record<string, string>
  options?: NoteOptions
  tags?: string[]
  audio?: MediaWire[]
  video?: MediaWire[]
  picture?: MediaWire[]
}

export function encodeBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('base64')
}

export function toMediaWire(media: Media): MediaWire {
  const wire: MediaWire = {
    filename: media.filename,
    data: encodeBase64(media.data),
    fields: [...media.fields]
  }
  if (media.skipHash !== undefined) {
    wire.skipHash = media.skipHash
  }
  return wire
}

function toOptionsWire(options: NoteOptions): NoteOptions {
  const wire: NoteOptions = {
    allowDuplicate: options.allowDuplicate,
    duplicateScope: options.duplicateScope
  }
  if (options.duplicateScopeOptions) {
    const { deckName, checkChildren, checkAllModels } = options.duplicateScopeOptions
    wire.duplicateScopeOptions = deckName !== undefined
      ? { deckName, checkChildren, checkAllModels }
      : { checkChildren, checkAllModels }
  }
  return wire
}

/**
 * @example
 * toNoteWire(note)
 * // { deckName: 'Default', modelName: 'Basic', fields: { Front: 'hi', Back: 'there' }, tags: ['greeting'] }
 */
export function toNoteWire(note: Note): NoteWire {
  const wire: NoteWire = {
    deckName: note.deckName,
    modelName: note.modelName,
    fields: Object.fromEntries(note.fields)
  }
  if (note.options !== undefined) wire.options = toOptionsWire(note.options)
  if (note.tags !== undefined) wire.tags = [...note.tags]
  if (note.audios !== undefined) wire.audio = note.audios.map(toMediaWire)
  if (note.videos !== undefined) wire.video = note.videos.map(toMediaWire)
  if (note.pictures !== undefined) wire.picture = note.pictures.map(toMediaWire)
  return wire
}
