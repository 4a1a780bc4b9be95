import type { EnvelopeCodec } from './envelope.js'
import type { AnkiId } from './identifiers.js'
import type { CallOptions } from './notes-api.js'
import { NameIdMapResultSchema, NameListResultSchema } from '../types/results.js'

/**
 * Note model (note type) listings.
 */
export class ModelsApi {
  constructor(private readonly codec: EnvelopeCodec) {}

  async modelNames(options: CallOptions = {}): Promise<string[]> {
    return this.codec.send('modelNames', NameListResultSchema, undefined, {
      signal: options.signal,
      expectedShape: 'string[]'
    })
  }

  async modelNamesAndIds(options: CallOptions = {}): Promise<Map<string, AnkiId>> {
    const result = await this.codec.send('modelNamesAndIds', NameIdMapResultSchema, undefined, {
      signal: options.signal,
      expectedShape: 'Record<string, number>'
    })
    return new Map(Object.entries(result))
  }
}
