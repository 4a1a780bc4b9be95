/**
 * Result Schemas with Zod Validation
 *
 * One schema per action result. The envelope codec decodes `result` with
 * these after sanitizing, so a shape change on the AnkiConnect side shows up
 * as a MalformedResponseError naming the schema below.
 */

import { z } from 'zod'

const Id = z.number().int().nonnegative()

/**
 * findNotes / deleteNotes inputs and findNotes output.
 * AnkiConnect may answer null instead of an empty list.
 */
export const NoteIdsResultSchema = z.array(Id).nullable()

export const NoteFieldSchema = z.object({
  value: z.string(),
  order: z.number().int()
})

export type NoteField = z.infer<typeof NoteFieldSchema>

/**
 * notesInfo element. Ids that do not exist come back as `{}` and are
 * dropped by sanitization before this schema runs.
 */
export const NoteInfoSchema = z.object({
  noteId: Id,
  profile: z.string().optional(),
  modelName: z.string(),
  tags: z.array(z.string()),
  fields: z.record(NoteFieldSchema),
  mod: z.number().int().optional(),
  cards: z.array(Id).optional()
})

export type NoteInfo = z.infer<typeof NoteInfoSchema>

export const NotesInfoResultSchema = z.array(NoteInfoSchema).nullable()

/**
 * addNotes: one entry per submitted note, null where the note was rejected.
 */
export const AddNotesResultSchema = z.array(Id.nullable()).nullable()

export const AddNoteResultSchema = Id

export const CanAddNotesResultSchema = z.array(z.boolean())

/** Actions that only acknowledge (deleteNotes, guiEditNote, updateNoteFields) */
export const EmptyResultSchema = z.null()

export const NameListResultSchema = z.array(z.string())

export const NameIdMapResultSchema = z.record(Id)

export const VersionResultSchema = z.number().int().positive()
