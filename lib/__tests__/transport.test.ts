/**
 * Unit tests for the axios-backed transport.
 * axios is mocked; no request leaves the process.
 */

import { AxiosTransport, toTransportError } from '../transport'
import { TransportError } from '../errors'

jest.mock('axios')

import axios from 'axios'

const mockPost = axios.post as jest.Mock
const mockGet = axios.get as jest.Mock

describe('AxiosTransport', () => {
  beforeEach(() => {
    jest.clearAllMocks()
  })

  describe('postJson', () => {
    it('posts the serialized body and returns the raw text', async () => {
      mockPost.mockResolvedValue({ status: 200, data: '{"result":6,"error":null}' })
      const transport = new AxiosTransport({ timeoutMs: 1234 })

      const text = await transport.postJson('http://127.0.0.1:8765', { action: 'version', version: 6 })

      expect(text).toBe('{"result":6,"error":null}')
      expect(mockPost).toHaveBeenCalledWith(
        'http://127.0.0.1:8765',
        '{"action":"version","version":6}',
        expect.objectContaining({
          timeout: 1234,
          responseType: 'text',
          headers: expect.objectContaining({ 'Content-Type': 'application/json' })
        })
      )
    })

    it('passes the abort signal through', async () => {
      mockPost.mockResolvedValue({ status: 200, data: '{}' })
      const controller = new AbortController()

      await new AxiosTransport().postJson('http://127.0.0.1:8765', {}, { signal: controller.signal })

      expect(mockPost).toHaveBeenCalledWith(
        'http://127.0.0.1:8765',
        '{}',
        expect.objectContaining({ signal: controller.signal, timeout: 30000 })
      )
    })

    it('maps a non-2xx status to TransportError', async () => {
      mockPost.mockResolvedValue({ status: 500, data: 'Internal Server Error' })

      await expect(new AxiosTransport().postJson('http://127.0.0.1:8765', {})).rejects.toMatchObject({
        kind: 'transport',
        status: 500,
        message: 'HTTP 500 from http://127.0.0.1:8765'
      })
    })

    it('maps a refused connection to TransportError', async () => {
      mockPost.mockRejectedValue({ code: 'ECONNREFUSED', message: 'connect ECONNREFUSED 127.0.0.1:8765' })

      await expect(new AxiosTransport().postJson('http://127.0.0.1:8765', {})).rejects.toMatchObject({
        kind: 'transport',
        code: 'ECONNREFUSED',
        message: 'Could not reach http://127.0.0.1:8765 (ECONNREFUSED)'
      })
    })
  })

  describe('getBytes', () => {
    it('returns the body as bytes', async () => {
      mockGet.mockResolvedValue({ status: 200, data: new Uint8Array([1, 2, 3]).buffer })

      const bytes = await new AxiosTransport().getBytes('https://example.com/a.mp3')

      expect(Array.from(bytes)).toEqual([1, 2, 3])
      expect(mockGet).toHaveBeenCalledWith(
        'https://example.com/a.mp3',
        expect.objectContaining({ responseType: 'arraybuffer', maxRedirects: 5 })
      )
    })

    it('maps 404 to TransportError', async () => {
      mockGet.mockResolvedValue({ status: 404, data: new ArrayBuffer(0) })

      await expect(new AxiosTransport().getBytes('https://example.com/missing.mp3')).rejects.toMatchObject({
        status: 404,
        message: 'HTTP 404 when downloading https://example.com/missing.mp3'
      })
    })
  })
})

describe('toTransportError', () => {
  const url = 'http://127.0.0.1:8765'

  it('recognizes timeouts', () => {
    const error = toTransportError({ code: 'ECONNABORTED', message: 'timeout of 500ms exceeded' }, url, 500)

    expect(error).toBeInstanceOf(TransportError)
    expect(error.message).toBe('Request to http://127.0.0.1:8765 timed out after 500ms')
    expect(error.code).toBe('ECONNABORTED')
  })

  it('recognizes cancellation', () => {
    const error = toTransportError({ code: 'ERR_CANCELED', message: 'canceled' }, url, 500)

    expect(error.message).toBe('Request to http://127.0.0.1:8765 was cancelled')
  })

  it('keeps the status of other failures', () => {
    const error = toTransportError({ message: 'bad gateway', response: { status: 502 } }, url, 500)

    expect(error.message).toBe('Request to http://127.0.0.1:8765 failed: bad gateway')
    expect(error.status).toBe(502)
  })

  it('handles thrown non-objects', () => {
    expect(toTransportError('socket closed', url, 500).message)
      .toBe('Request to http://127.0.0.1:8765 failed: socket closed')
  })
})
