import axios from 'axios'
import { TransportError } from './errors.js'

export interface RequestOptions {
  signal?: AbortSignal
}

/**
 * HTTP capability the client needs: POST a JSON body and read the raw text
 * answer, and GET a resource as bytes.
 *
 * Implementations must be safe to share between concurrent callers.
 */
export interface Transport {
  postJson(url: string, body: unknown, options?: RequestOptions): Promise<string>
  getBytes(url: string, options?: RequestOptions): Promise<Uint8Array>
}

export interface AxiosTransportOptions {
  /** Request timeout in ms (default: 30000) */
  timeoutMs?: number
  /** Extra headers sent with every request */
  headers?: Record<string, string>
  /** Maximum redirects followed for media downloads (default: 5) */
  maxRedirects?: number
}

/**
 * Transport backed by axios.
 *
 * Network-level failures and non-2xx statuses become `TransportError`; the
 * body is handed back untouched so the envelope codec can decode it.
 */
export class AxiosTransport implements Transport {
  private readonly timeoutMs: number
  private readonly headers: Record<string, string>
  private readonly maxRedirects: number

  constructor(options: AxiosTransportOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 30000
    this.headers = { ...options.headers }
    this.maxRedirects = options.maxRedirects ?? 5
  }

  async postJson(url: string, body: unknown, options: RequestOptions = {}): Promise<string> {
    let response
    try {
      response = await axios.post<string>(url, JSON.stringify(body), {
        timeout: this.timeoutMs,
        signal: options.signal,
        headers: { ...this.headers, 'Content-Type': 'application/json' },
        responseType: 'text',
        validateStatus: () => true // statuses are checked below
      })
    } catch (error: unknown) {
      throw toTransportError(error, url, this.timeoutMs)
    }

    if (response.status < 200 || response.status >= 300) {
      throw new TransportError(`HTTP ${response.status} from ${url}`, { status: response.status, url })
    }

    return typeof response.data === 'string' ? response.data : JSON.stringify(response.data)
  }

  async getBytes(url: string, options: RequestOptions = {}): Promise<Uint8Array> {
    let response
    try {
      response = await axios.get<ArrayBuffer>(url, {
        timeout: this.timeoutMs,
        signal: options.signal,
        headers: this.headers,
        responseType: 'arraybuffer',
        maxRedirects: this.maxRedirects,
        validateStatus: () => true
      })
    } catch (error: unknown) {
      throw toTransportError(error, url, this.timeoutMs)
    }

    if (response.status < 200 || response.status >= 300) {
      throw new TransportError(`HTTP ${response.status} when downloading ${url}`, { status: response.status, url })
    }

    return new Uint8Array(response.data)
  }
}

/**
 * Maps an axios rejection to a `TransportError`.
 * Reads the error structurally so it works on any thrown value.
 */
export function toTransportError(error: unknown, url: string, timeoutMs: number): TransportError {
  const { message, code, status } = describeFailure(error)

  if (code === 'ECONNABORTED' || code === 'ETIMEDOUT' || message.includes('timeout')) {
    return new TransportError(`Request to ${url} timed out after ${timeoutMs}ms`, { code: code ?? 'ECONNABORTED', url })
  }
  if (code === 'ERR_CANCELED') {
    return new TransportError(`Request to ${url} was cancelled`, { code, url })
  }
  if (code === 'ECONNREFUSED' || code === 'ENOTFOUND' || code === 'ECONNRESET') {
    return new TransportError(`Could not reach ${url} (${code})`, { code, url })
  }
  return new TransportError(`Request to ${url} failed: ${message}`, { code, status, url })
}

function describeFailure(error: unknown): { message: string; code?: string; status?: number } {
  if (typeof error !== 'object' || error === null) {
    return { message: String(error) }
  }

  const message = 'message' in error && typeof error.message === 'string' ? error.message : String(error)
  const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined
  let status: number | undefined
  if ('response' in error && typeof error.response === 'object' && error.response !== null) {
    const response = error.response
    if ('status' in response && typeof response.status === 'number') {
      status = response.status
    }
  }

  return { message, code, status }
}
