/**
 * AnkiConnect client
 *
 * Wires one transport and one envelope codec into the notes, decks and
 * models APIs, plus the advisory name caches.
 *
 * The protocol version is configuration (ANKI_CONNECT_VERSION, default 6).
 * `getServiceVersion()` asks the service for the version it speaks, for
 * callers that want to check before sending anything else.
 */

import { EnvelopeCodec } from './envelope.js'
import { AxiosTransport, type Transport } from './transport.js'
import { loadConfig, type AnkiConnectConfig, type ConfigOverrides } from './config.js'
import { NotesApi, type CallOptions } from './notes-api.js'
import { DecksApi } from './decks-api.js'
import { ModelsApi } from './models-api.js'
import { NameCache } from './name-cache.js'
import { NoteBuilder, type BuildOptions } from './note-builder.js'
import type { AnkiId } from './identifiers.js'
import type { Note } from '../types/note.js'
import { VersionResultSchema } from '../types/results.js'

export interface AnkiClientOptions {
  config: AnkiConnectConfig
  /** Defaults to an AxiosTransport using the configured timeout */
  transport?: Transport
}

export interface AnkiCaches {
  decks: NameCache<AnkiId>
  models: NameCache<AnkiId>
}

export class AnkiClient {
  readonly config: AnkiConnectConfig
  readonly transport: Transport
  readonly notes: NotesApi
  readonly decks: DecksApi
  readonly models: ModelsApi
  readonly cache: AnkiCaches
  private readonly codec: EnvelopeCodec

  constructor(options: AnkiClientOptions) {
    this.config = options.config
    this.transport = options.transport ?? new AxiosTransport({ timeoutMs: options.config.timeoutMs })
    this.codec = new EnvelopeCodec({
      endpoint: this.config.endpoint,
      version: this.config.version,
      transport: this.transport,
      quiet: this.config.quiet
    })

    this.notes = new NotesApi(this.codec)
    this.decks = new DecksApi(this.codec)
    this.models = new ModelsApi(this.codec)
    this.cache = {
      decks: new NameCache('decks', (opts) => this.decks.deckNamesAndIds(opts), this.config.quiet),
      models: new NameCache('models', (opts) => this.models.modelNamesAndIds(opts), this.config.quiet)
    }
  }

  /**
   * Protocol version reported by AnkiConnect (`version` action).
   */
  async getServiceVersion(options: CallOptions = {}): Promise<number> {
    return this.codec.send('version', VersionResultSchema, undefined, {
      signal: options.signal,
      expectedShape: 'number'
    })
  }

  /**
   * Builds a note with this client's transport and media concurrency.
   */
  async buildNote(builder: NoteBuilder, options: BuildOptions = {}): Promise<Note> {
    return builder.build(this.transport, {
      concurrency: this.config.mediaConcurrency,
      quiet: this.config.quiet,
      ...options
    })
  }

  /**
   * Refreshes the deck and model name caches together.
   */
  async refreshCaches(options: CallOptions = {}): Promise<void> {
    await Promise.all([
      this.cache.decks.refresh(options),
      this.cache.models.refresh(options)
    ])
  }
}

/**
 * Client from the environment plus explicit overrides.
 *
 * @example
 * const anki = createAnkiClient({ endpoint: 'http://127.0.0.1:8765' })
 * const ids = await anki.notes.findNotes('deck:Default')
 */
export function createAnkiClient(overrides: ConfigOverrides = {}, transport?: Transport): AnkiClient {
  return new AnkiClient({ config: loadConfig(overrides), transport })
}
