import type { Media } from '../lib/media.js'

/**
 * Which notes a duplicate check looks at.
 * `deck` only checks the target deck; anything else checks the whole collection.
 */
export type DuplicateScope = 'deck' | 'entire-collection'

export interface DuplicateScopeOptions {
  /** Deck to check for duplicates in; the target deck when unset */
  deckName?: string
  checkChildren: boolean
  checkAllModels: boolean
}

export interface NoteOptions {
  allowDuplicate: boolean
  duplicateScope: DuplicateScope
  duplicateScopeOptions?: DuplicateScopeOptions
}

/**
 * A validated note, ready to send. Produced by `NoteBuilder.build` and frozen.
 *
 * `fields` keeps insertion order and is a read-only `FieldMap` once built.
 * Media items carry resolved bytes.
 */
export interface Note {
  readonly deckName: string
  readonly modelName: string
  readonly fields: ReadonlyMap<string, string>
  readonly options?: NoteOptions
  readonly tags?: readonly string[]
  readonly audios?: readonly Media[]
  readonly videos?: readonly Media[]
  readonly pictures?: readonly Media[]
}
