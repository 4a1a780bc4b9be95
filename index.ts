export { AnkiClient, createAnkiClient, type AnkiCaches, type AnkiClientOptions } from './lib/anki-client.js'
export {
  loadConfig,
  loadEnvFile,
  DEFAULT_ENDPOINT,
  DEFAULT_VERSION,
  type AnkiConnectConfig,
  type ConfigOverrides
} from './lib/config.js'
export {
  EnvelopeCodec,
  buildEnvelope,
  decodeEnvelope,
  dropEmptyObjects,
  parseEnvelopeText,
  sanitizeEnvelope,
  type EnvelopeCodecOptions,
  type RequestEnvelope,
  type ResponseEnvelope,
  type SendOptions
} from './lib/envelope.js'
export {
  AnkiConnectError,
  RemoteRejectedError,
  NoDataFoundError,
  TransportError,
  MalformedResponseError,
  InvalidIdentifierError,
  ValidationFailedError,
  MissingMediaSourceError,
  IoError,
  isAnkiConnectError,
  classifyError,
  getUserFriendlyError,
  type AnkiErrorKind,
  type ErrorClass
} from './lib/errors.js'
export { toAnkiId, toAnkiIds, type AnkiId, type IdentifierInput } from './lib/identifiers.js'
export {
  MediaPath,
  isValidUrl,
  mediaSourceFromBytes,
  mediaSourceFromPath,
  mediaSourceFromString,
  mediaSourceFromUrl,
  resolveMediaSource,
  takeMediaSource,
  type MediaSource,
  type ResolveOptions,
  type SourceHolder
} from './lib/media-source.js'
export { MediaBuilder, inlineMedia, resolveMedia, type Media, type MediaKind } from './lib/media.js'
export { FieldMap } from './lib/field-map.js'
export { NoteBuilder, type BuildOptions, type FieldsInput } from './lib/note-builder.js'
export { toNoteWire, toMediaWire, type NoteWire, type MediaWire } from './lib/note-wire.js'
export { NotesApi, type CallOptions } from './lib/notes-api.js'
export { DecksApi } from './lib/decks-api.js'
export { ModelsApi } from './lib/models-api.js'
export { NameCache, type NameCacheStats, type NameLoader } from './lib/name-cache.js'
export {
  anyOf,
  cardStateQuery,
  combineQueries,
  deckQuery,
  modelQuery,
  tagQuery,
  type CardState,
  type SearchQuery
} from './lib/search-query.js'
export { AxiosTransport, type AxiosTransportOptions, type RequestOptions, type Transport } from './lib/transport.js'
export type { DuplicateScope, DuplicateScopeOptions, Note, NoteOptions } from './types/note.js'
export type { NoteField, NoteInfo } from './types/results.js'
