import type { EnvelopeCodec } from './envelope.js'
import type { Note } from '../types/note.js'
import { NoDataFoundError, ValidationFailedError } from './errors.js'
import { toAnkiId, toAnkiIds, type AnkiId, type IdentifierInput } from './identifiers.js'
import { toNoteWire } from './note-wire.js'
import type { SearchQuery } from './search-query.js'
import {
  AddNoteResultSchema,
  AddNotesResultSchema,
  CanAddNotesResultSchema,
  EmptyResultSchema,
  NoteIdsResultSchema,
  NotesInfoResultSchema,
  type NoteInfo
} from '../types/results.js'

export interface CallOptions {
  signal?: AbortSignal
}

/**
 * Note actions.
 *
 * Each method builds its params, sends them through the shared codec and
 * decides what an empty result means for that action.
 */
export class NotesApi {
  constructor(private readonly codec: EnvelopeCodec) {}

  /**
   * Note ids matching an Anki search. No match is an empty list, not an error.
   *
   * @example
   * await notes.findNotes(combineQueries(deckQuery('Default'), cardStateQuery('isNew')))
   */
  async findNotes(query: string | SearchQuery, options: CallOptions = {}): Promise<AnkiId[]> {
    const result = await this.codec.send('findNotes', NoteIdsResultSchema, { query: query.toString() }, {
      signal: options.signal,
      expectedShape: 'number[]'
    })
    return result ?? []
  }

  /**
   * Full info for each id. Unknown ids are skipped by AnkiConnect.
   *
   * @throws {NoDataFoundError} when none of the ids matched
   */
  async notesInfo(ids: Iterable<IdentifierInput>, options: CallOptions = {}): Promise<NoteInfo[]> {
    const notes = toAnkiIds(ids)
    const result = await this.codec.send('notesInfo', NotesInfoResultSchema, { notes }, {
      signal: options.signal,
      expectedShape: 'NoteInfo[]'
    })
    if (!result || result.length === 0) {
      throw new NoDataFoundError('notesInfo')
    }
    return result
  }

  /**
   * Adds notes. The returned list lines up with `notes`; an entry is null
   * when AnkiConnect refused that note (e.g. a duplicate).
   *
   * @throws {NoDataFoundError} when AnkiConnect returned no ids at all
   */
  async addNotes(notes: readonly Note[], options: CallOptions = {}): Promise<Array<AnkiId | null>> {
    if (notes.length === 0) {
      throw new ValidationFailedError('notes')
    }
    const result = await this.codec.send('addNotes', AddNotesResultSchema, { notes: notes.map(toNoteWire) }, {
      signal: options.signal,
      expectedShape: 'Array<number | null>'
    })
    if (!result || result.length === 0) {
      throw new NoDataFoundError('addNotes')
    }
    return result
  }

  async addNote(note: Note, options: CallOptions = {}): Promise<AnkiId> {
    return this.codec.send('addNote', AddNoteResultSchema, { note: toNoteWire(note) }, {
      signal: options.signal,
      expectedShape: 'number'
    })
  }

  /**
   * Whether each note could be added (checks required fields and duplicates).
   */
  async canAddNotes(notes: readonly Note[], options: CallOptions = {}): Promise<boolean[]> {
    return this.codec.send('canAddNotes', CanAddNotesResultSchema, { notes: notes.map(toNoteWire) }, {
      signal: options.signal,
      expectedShape: 'boolean[]'
    })
  }

  async updateNoteFields(
    id: IdentifierInput,
    fields: ReadonlyMap<string, string> | Readonly<Record<string, string>>,
    options: CallOptions = {}
  ): Promise<void> {
    const entries = isFieldMap(fields) ? Object.fromEntries(fields) : { ...fields }
    if (Object.keys(entries).length === 0) {
      throw new ValidationFailedError('fields')
    }
    await this.codec.send('updateNoteFields', EmptyResultSchema, { note: { id: toAnkiId(id), fields: entries } }, {
      signal: options.signal,
      expectedShape: 'null'
    })
  }

  async deleteNotes(ids: Iterable<IdentifierInput>, options: CallOptions = {}): Promise<void> {
    const notes = toAnkiIds(ids)
    await this.codec.send('deleteNotes', EmptyResultSchema, { notes }, {
      signal: options.signal,
      expectedShape: 'null'
    })
  }

  /**
   * Opens the Anki note editor for `id`.
   */
  async guiEditNote(id: IdentifierInput, options: CallOptions = {}): Promise<void> {
    await this.codec.send('guiEditNote', EmptyResultSchema, { note: toAnkiId(id) }, {
      signal: options.signal,
      expectedShape: 'null'
    })
  }
}

function isFieldMap(
  fields: ReadonlyMap<string, string> | Readonly<Record<string, string>>
): fields is ReadonlyMap<string, string> {
  return fields instanceof Map
}
