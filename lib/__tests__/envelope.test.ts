/**
 * Tests for the request envelope codec: envelope building, sanitization,
 * decoding and error mapping.
 */

import { z } from 'zod'
import {
  EnvelopeCodec,
  buildEnvelope,
  decodeEnvelope,
  dropEmptyObjects,
  parseEnvelopeText,
  sanitizeEnvelope
} from '../envelope'
import {
  MalformedResponseError,
  RemoteRejectedError,
  TransportError,
  ValidationFailedError
} from '../errors'
import { FakeTransport, createEnvelope } from '../../__tests__/mocks/transport'

const ENDPOINT = 'http://127.0.0.1:8765'

function createCodec(transport: FakeTransport): EnvelopeCodec {
  return new EnvelopeCodec({ endpoint: ENDPOINT, version: 6, transport, quiet: true })
}

describe('buildEnvelope', () => {
  it('includes params when given', () => {
    expect(buildEnvelope('findNotes', 6, { query: 'deck:Default' })).toEqual({
      action: 'findNotes',
      version: 6,
      params: { query: 'deck:Default' }
    })
  })

  it('omits params entirely when absent', () => {
    const envelope = buildEnvelope('deckNames', 6)

    expect('params' in envelope).toBe(false)
    expect(JSON.stringify(envelope)).toBe('{"action":"deckNames","version":6}')
  })

  it('rejects an empty action', () => {
    expect(() => buildEnvelope('  ', 6)).toThrow(ValidationFailedError)
  })

  it('rejects a non-integer version', () => {
    expect(() => buildEnvelope('version', 6.5)).toThrow('Validation failed for version: expected a positive integer, got 6.5')
    expect(() => buildEnvelope('version', 0)).toThrow(ValidationFailedError)
  })

  it('reproduces params exactly after a JSON round trip', () => {
    const params = { notes: [1, 2, 3], nested: { deckName: 'Default', tags: ['a', 'b'] }, flag: false }
    const decoded = JSON.parse(JSON.stringify(buildEnvelope('addNotes', 6, params)))

    expect(decoded.params).toEqual(params)
  })
})

describe('sanitization', () => {
  it('drops empty objects and keeps everything else in order', () => {
    const items = [1, {}, { noteId: 5 }, [], null, 'x', {}, [{}]]

    expect(dropEmptyObjects(items)).toEqual([1, { noteId: 5 }, [], null, 'x', [{}]])
  })

  it('only touches a top-level result array', () => {
    const body = { result: [{}, { a: 1 }], error: null }

    expect(sanitizeEnvelope(body)).toEqual({ result: [{ a: 1 }], error: null })
  })

  it('returns non-array results unchanged', () => {
    const objectResult = { result: { Default: 1 }, error: null }
    const emptyObjectResult = { result: {}, error: null }

    expect(sanitizeEnvelope(objectResult)).toBe(objectResult)
    expect(sanitizeEnvelope(emptyObjectResult)).toBe(emptyObjectResult)
    expect(sanitizeEnvelope('text')).toBe('text')
    expect(sanitizeEnvelope(null)).toBeNull()
  })

  it('is idempotent', () => {
    const samples: unknown[][] = [
      [],
      [{}],
      [{}, {}, 1],
      [{ a: {} }, {}, [{}], 0, false],
      ['a', 'b']
    ]

    for (const sample of samples) {
      const once = dropEmptyObjects(sample)
      expect(dropEmptyObjects(once)).toEqual(once)
    }
  })
})

describe('parseEnvelopeText', () => {
  it('parses JSON', () => {
    expect(parseEnvelopeText('{"result":1,"error":null}')).toEqual({ result: 1, error: null })
  })

  it('raises MalformedResponseError with the raw text for invalid JSON', () => {
    try {
      parseEnvelopeText('<html>oops</html>')
      throw new Error('expected parseEnvelopeText to throw')
    } catch (error) {
      expect(error).toBeInstanceOf(MalformedResponseError)
      if (error instanceof MalformedResponseError) {
        expect(error.expectedShape).toBe('JSON envelope')
        expect(error.receivedValue).toBe('<html>oops</html>')
        expect(error.diagnostic).toMatch(/^Body is not valid JSON: /)
      }
    }
  })
})

describe('decodeEnvelope', () => {
  const Ids = z.array(z.number())

  it('returns the decoded result', () => {
    expect(decodeEnvelope({ result: [1, 2], error: null }, Ids)).toEqual([1, 2])
  })

  it('reproduces a result that needs no sanitizing', () => {
    const result = [{ noteId: 1, tags: ['a'] }, { noteId: 2, tags: [] }]
    const schema = z.array(z.object({ noteId: z.number(), tags: z.array(z.string()) }))

    expect(decodeEnvelope(sanitizeEnvelope({ result, error: null }), schema)).toEqual(result)
  })

  it('rejects with the remote error even when result is present', () => {
    const body = { result: [1, 2], error: 'collection is not available' }

    expect(() => decodeEnvelope(body, Ids)).toThrow(RemoteRejectedError)
    expect(() => decodeEnvelope(body, Ids)).toThrow('collection is not available')
  })

  it('prefers the remote error over a result that would not decode', () => {
    expect(() => decodeEnvelope({ result: 'garbage', error: 'unsupported action' }, Ids))
      .toThrow(RemoteRejectedError)
  })

  it('treats a missing result as null', () => {
    expect(decodeEnvelope({ error: null }, z.null())).toBeNull()
    expect(decodeEnvelope({ result: null, error: null }, Ids.nullable())).toBeNull()
  })

  it('raises MalformedResponseError for a body that is not an envelope', () => {
    expect(() => decodeEnvelope([1, 2], Ids, 'number[]')).toThrow(MalformedResponseError)
    expect(() => decodeEnvelope({ result: [], error: 42 }, Ids, 'number[]')).toThrow(MalformedResponseError)
  })

  it('keeps the shape name, raw body and zod diagnostic on a result mismatch', () => {
    const body = { result: [1, 'two'], error: null }

    try {
      decodeEnvelope(body, Ids, 'number[]')
      throw new Error('expected decodeEnvelope to throw')
    } catch (error) {
      expect(error).toBeInstanceOf(MalformedResponseError)
      if (error instanceof MalformedResponseError) {
        expect(error.expectedShape).toBe('number[]')
        expect(error.receivedValue).toBe(body)
        expect(error.diagnostic).toBe('1: Expected number, received string')
        expect(error.issues).toEqual([{ path: [1], message: 'Expected number, received string' }])
      }
    }
  })
})

describe('EnvelopeCodec.send', () => {
  it('posts the envelope to the endpoint and returns the result', async () => {
    const transport = new FakeTransport().replyWith(createEnvelope([1483959289817, 1483959291695]))
    const codec = createCodec(transport)

    const result = await codec.send('findNotes', z.array(z.number()), { query: 'is:new' })

    expect(result).toEqual([1483959289817, 1483959291695])
    expect(transport.posts).toEqual([
      { url: ENDPOINT, body: { action: 'findNotes', version: 6, params: { query: 'is:new' } } }
    ])
  })

  it('sends no params key for parameterless actions', async () => {
    const transport = new FakeTransport().replyWith(createEnvelope(['Default']))

    await createCodec(transport).send('deckNames', z.array(z.string()))

    expect(transport.lastBody).toEqual({ action: 'deckNames', version: 6 })
  })

  it('drops empty placeholder records before decoding', async () => {
    const transport = new FakeTransport().replyWith(createEnvelope([{}, { id: 1 }, {}]))
    const schema = z.array(z.object({ id: z.number() }))

    await expect(createCodec(transport).send('notesInfo', schema, { notes: [1, 2, 3] })).resolves.toEqual([{ id: 1 }])
  })

  it('warns when placeholders were dropped', async () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined)
    const log = jest.spyOn(console, 'log').mockImplementation(() => undefined)
    const transport = new FakeTransport().replyWith(createEnvelope([{}, 1]))
    const codec = new EnvelopeCodec({ endpoint: ENDPOINT, version: 6, transport })

    await codec.send('findNotes', z.array(z.number()), { query: '' })

    expect(log).toHaveBeenCalledWith('[AnkiConnect] -> findNotes')
    expect(warn).toHaveBeenCalledWith('[AnkiConnect] findNotes: dropped 1 empty placeholder record(s) from result')
    warn.mockRestore()
    log.mockRestore()
  })

  it('surfaces the remote error verbatim', async () => {
    const transport = new FakeTransport().replyWith(createEnvelope(null, 'model was not found: Cloze2'))

    await expect(createCodec(transport).send('addNote', z.number(), { note: {} }))
      .rejects.toEqual(new RemoteRejectedError('model was not found: Cloze2'))
  })

  it('propagates transport failures unchanged', async () => {
    const failure = new TransportError('Could not reach http://127.0.0.1:8765 (ECONNREFUSED)', { code: 'ECONNREFUSED' })
    const transport = new FakeTransport().failWith(failure)

    await expect(createCodec(transport).send('version', z.number())).rejects.toBe(failure)
  })

  it('wraps a plain transport error as TransportError', async () => {
    const transport = new FakeTransport().failWith(new Error('socket hang up'))

    await expect(createCodec(transport).send('version', z.number())).rejects.toMatchObject({
      kind: 'transport',
      url: ENDPOINT,
      message: 'Request to http://127.0.0.1:8765 failed: socket hang up'
    })
  })

  it('uses the action name as the shape when none is given', async () => {
    const transport = new FakeTransport().replyWith(createEnvelope('six'))

    await expect(createCodec(transport).send('version', z.number())).rejects.toMatchObject({
      kind: 'malformed_response',
      expectedShape: 'version'
    })
  })

  it('rejects a non-JSON body as malformed', async () => {
    const transport = new FakeTransport().replyRaw('AnkiConnect v.6')

    await expect(createCodec(transport).send('version', z.number())).rejects.toBeInstanceOf(MalformedResponseError)
  })
})
