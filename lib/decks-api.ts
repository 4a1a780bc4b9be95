import type { EnvelopeCodec } from './envelope.js'
import type { AnkiId } from './identifiers.js'
import type { CallOptions } from './notes-api.js'
import { NameIdMapResultSchema, NameListResultSchema } from '../types/results.js'

export class DecksApi {
  constructor(private readonly codec: EnvelopeCodec) {}

  async deckNames(options: CallOptions = {}): Promise<string[]> {
    return this.codec.send('deckNames', NameListResultSchema, undefined, {
      signal: options.signal,
      expectedShape: 'string[]'
    })
  }

  /**
   * Deck name to deck id, in the order AnkiConnect listed them.
   */
  async deckNamesAndIds(options: CallOptions = {}): Promise<Map<string, AnkiId>> {
    const result = await this.codec.send('deckNamesAndIds', NameIdMapResultSchema, undefined, {
      signal: options.signal,
      expectedShape: 'Record<string, number>'
    })
    return new Map(Object.entries(result))
  }
}
