import type { Clock } from './clock'

/**
 * Static inputs for authenticating as a GitHub App installation.
 */
export interface AuthParameters {
  /**
   * Sent as the User-Agent on every request. GitHub rejects requests
   * without one and asks for the app name or the owner's username.
   */
  userAgent: string
  /** PEM private key generated on the app's settings page (PKCS#1 or PKCS#8). */
  privateKey: string | Uint8Array
  /** "App ID" on the app's settings page. */
  appId: number
  /**
   * Last path segment of the installation's configuration URL, e.g. 1216616 in
   * github.com/organizations/acme/settings/installations/1216616.
   */
  installationId: number
}

export interface IdentityAssertionClaims {
  iat: number
  exp: number
  iss: string
}

export interface InstallationTokenResponse {
  token: string
  expiresAt: Date
}

export interface CredentialState {
  token: string
  /** Local clock reading, in epoch seconds, taken when `token` was obtained. */
  fetchedAt: number
  /** Expiry declared by GitHub. Informational only. */
  expiresAt: Date
}

export interface Logger {
  debug: (message: string, meta?: Record<string, unknown>) => void
  info: (message: string, meta?: Record<string, unknown>) => void
  warn: (message: string, meta?: Record<string, unknown>) => void
  error: (message: string, meta?: Record<string, unknown>) => void
}

export interface CredentialManagerOptions {
  /** API root; set for GitHub Enterprise Server. */
  baseUrl?: string
  fetch?: typeof fetch
  now?: Clock
  logger?: Logger
}

export type AuthorizationHeaders = Record<string, string> & { Authorization: string }
