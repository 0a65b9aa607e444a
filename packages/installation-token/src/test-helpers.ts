import { generateKeyPairSync } from 'node:crypto'
import { vi, type Mock } from 'vitest'
import type { Logger } from './types'

export type FetchMock = Mock<typeof fetch>

export const rsaKeys = generateKeyPairSync('rsa', {
  modulusLength: 2048,
  publicKeyEncoding: { type: 'spki', format: 'pem' },
  privateKeyEncoding: { type: 'pkcs1', format: 'pem' },
})

export function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json; charset=utf-8' },
  })
}

export function tokenResponse(token: string, expiresAt = '2030-01-01T00:00:00Z'): Response {
  return jsonResponse(201, { token, expires_at: expiresAt })
}

export type MockLogger = { [K in keyof Logger]: Mock<Logger[K]> }

export function createLogger(): MockLogger {
  return {
    debug: vi.fn<Logger['debug']>(),
    info: vi.fn<Logger['info']>(),
    warn: vi.fn<Logger['warn']>(),
    error: vi.fn<Logger['error']>(),
  }
}

export function requestHeaders(fetchMock: FetchMock, callIndex: number): Headers {
  const call = fetchMock.mock.calls[callIndex]
  if (!call) {
    throw new Error(`Expected fetch call #${callIndex}`)
  }
  return new Headers(call[1]?.headers)
}
