import { z } from 'zod'

import type { RequestOptions } from '../types'

export type RpcClientOptions = {
  urls: string[]
  clientKey?: string
  timeoutMs?: number
  headers?: Record<string, string>
  rotateOnError?: boolean
}

export type RpcErrorPayload = {
  code: number
  message: string
  data?: unknown
}

export class RpcHttpError extends Error {
  readonly status: number
  readonly endpoint: string
  readonly method: string

  constructor(status: number, endpoint: string, method: string) {
    super(`RPC responded with ${status}`)
    this.name = 'RpcHttpError'
    this.status = status
    this.endpoint = endpoint
    this.method = method
  }
}

export class RpcResponseError extends Error {
  readonly code: number
  readonly data?: unknown
  readonly endpoint: string
  readonly method: string

  constructor(payload: RpcErrorPayload, endpoint: string, method: string) {
    super(payload.message)
    this.name = 'RpcResponseError'
    this.code = payload.code
    this.data = payload.data
    this.endpoint = endpoint
    this.method = method
  }
}

const JsonRpcIdSchema = z.union([z.number(), z.string(), z.null()])

const JsonRpcResponseSchema = z.union([
  z.object({
    jsonrpc: z.literal('2.0'),
    id: JsonRpcIdSchema,
    error: z.object({
      code: z.number(),
      message: z.string(),
      data: z.unknown().optional(),
    }),
  }),
  z.object({
    jsonrpc: z.literal('2.0'),
    id: JsonRpcIdSchema,
    result: z.unknown(),
  }),
])

const DEFAULT_TIMEOUT_MS = 12_000
const BASE_BACKOFF_MS = 5_000
const MAX_BACKOFF_MS = 120_000

// One abort signal per attempt: fires on the caller's abort or when the attempt times out.
const createAttemptSignal = (timeoutMs: number, callerSignal?: AbortSignal) => {
  const controller = new AbortController()
  const abortFromCaller = () => controller.abort(callerSignal?.reason)

  if (callerSignal?.aborted) {
    abortFromCaller()
  } else {
    callerSignal?.addEventListener('abort', abortFromCaller, { once: true })
  }

  const timer = setTimeout(
    () => controller.abort(new Error(`RPC request timed out after ${timeoutMs}ms`)),
    timeoutMs,
  )

  return {
    signal: controller.signal,
    release: () => {
      clearTimeout(timer)
      callerSignal?.removeEventListener('abort', abortFromCaller)
    },
  }
}

export class ModularRpcClient {
  private readonly urls: string[]
  private readonly timeoutMs: number
  private readonly headers: Record<string, string>
  private readonly rotateOnError: boolean
  private readonly failures = new Map<string, { count: number; retryAt: number }>()
  private cursor = 0
  private nextId = 0

  constructor(options: RpcClientOptions) {
    this.urls = [...new Set(options.urls.filter(Boolean))]
    if (this.urls.length === 0) {
      throw new Error('ModularRpcClient requires at least one endpoint')
    }

    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS
    this.rotateOnError = options.rotateOnError ?? true
    this.headers = {
      'content-type': 'application/json',
      ...(options.clientKey ? { authorization: `Bearer ${options.clientKey}` } : {}),
      ...options.headers,
    }
  }

  getActiveUrl() {
    return this.urls[this.cursor]
  }

  async request(method: string, params: unknown[] = [], options: RequestOptions = {}) {
    const endpoints = this.rotateOnError ? this.orderEndpoints() : [this.urls[this.cursor]]
    let lastError: unknown

    for (const [index, url] of endpoints.entries()) {
      try {
        const result = await this.send(url, method, params, options.signal)
        this.cursor = this.urls.indexOf(url)
        this.failures.delete(url)
        return result
      } catch (error) {
        if (options.signal?.aborted) {
          throw error
        }
        lastError = error
        this.markEndpointFailure(url)
        if (index + 1 < endpoints.length) {
          console.warn(`[ModularRpcClient] ${method} failed on ${url}; trying next endpoint.`, error)
        }
      }
    }

    throw lastError
  }

  // Backs the endpoint off exponentially; it is retried first again once the backoff lapses.
  markEndpointFailure(url: string) {
    const count = (this.failures.get(url)?.count ?? 0) + 1
    const backoff = Math.min(BASE_BACKOFF_MS * 2 ** (count - 1), MAX_BACKOFF_MS)
    this.failures.set(url, { count, retryAt: Date.now() + backoff })
  }

  // Starting from the last endpoint that answered; endpoints still backing off go last.
  private orderEndpoints() {
    const now = Date.now()
    const rotated = this.urls.map((_, offset) => this.urls[(this.cursor + offset) % this.urls.length])
    const backingOff = (url: string) => (this.failures.get(url)?.retryAt ?? 0) > now
    return [...rotated.filter((url) => !backingOff(url)), ...rotated.filter(backingOff)]
  }

  private async send(url: string, method: string, params: unknown[], callerSignal?: AbortSignal) {
    const id = this.nextId
    this.nextId += 1

    const attempt = createAttemptSignal(this.timeoutMs, callerSignal)
    try {
      const response = await fetch(url, {
        method: 'POST',
        headers: this.headers,
        body: JSON.stringify({ jsonrpc: '2.0', id, method, params }),
        signal: attempt.signal,
      })
      if (!response.ok) {
        throw new RpcHttpError(response.status, url, method)
      }

      const payload = JsonRpcResponseSchema.parse(await response.json())
      if ('error' in payload) {
        throw new RpcResponseError(payload.error, url, method)
      }
      return payload.result
    } finally {
      attempt.release()
    }
  }
}
