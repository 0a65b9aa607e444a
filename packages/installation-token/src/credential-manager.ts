import { Octokit } from '@octokit/rest'
import { loadConfig, type Config } from '@appauth/config'
import { signIdentityAssertion } from './assertion'
import { secondsSince, readClock, systemClock, type Clock } from './clock'
import { HeaderEncodingError } from './errors'
import { exchangeInstallationToken } from './exchange'
import { parseAuthParameters } from './parameters'
import type {
  AuthParameters,
  AuthorizationHeaders,
  CredentialManagerOptions,
  CredentialState,
  Logger,
} from './types'

// Installation tokens expire after 60 minutes. Refresh after 55 to leave
// room for clock skew and for the caller to use the header.
export const REFRESH_AFTER_SECONDS = 55 * 60

const LOG_PREFIX = '[installation-token]'

// Same rule Node applies to outgoing header values.
const INVALID_HEADER_CHAR = /[^\t\x20-\x7e\x80-\xff]/

const consoleLogger: Logger = {
  debug: (message, meta) => console.debug(message, meta ?? {}),
  info: (message, meta) => console.log(message, meta ?? {}),
  warn: (message, meta) => console.warn(message, meta ?? {}),
  error: (message, meta) => console.error(message, meta ?? {}),
}

const noop = () => {}

// Octokit's request log carries request options, headers included. Only its
// deprecation warnings are forwarded.
function octokitLog(logger: Logger) {
  return {
    debug: noop,
    info: noop,
    warn: (message: string) => logger.warn(`${LOG_PREFIX} ${message}`),
    error: noop,
  }
}

export function isStaleAfter(elapsedSeconds: number): boolean {
  return elapsedSeconds > REFRESH_AFTER_SECONDS
}

export function authorizationHeaders(token: string): AuthorizationHeaders {
  const value = `token ${token}`
  if (INVALID_HEADER_CHAR.test(value)) {
    throw new HeaderEncodingError('Installation token contains characters not allowed in an HTTP header')
  }
  return { Authorization: value }
}

export function configToAuthParameters(config: Config): AuthParameters {
  return {
    userAgent: config.userAgent,
    privateKey: config.privateKey,
    appId: config.appId,
    installationId: config.installationId,
  }
}

/**
 * Holds a GitHub App installation token and refreshes it on use.
 *
 * ```ts
 * const credentials = await InstallationCredentialManager.create({
 *   userAgent: 'release-bot',
 *   privateKey: pem,
 *   appId: 1234,
 *   installationId: 5678,
 * })
 *
 * await credentials.client.request('GET /installation/repositories', {
 *   headers: await credentials.getHeaders(),
 * })
 * ```
 *
 * Refresh happens inside `getHeaders()`; there are no timers. A manager is not
 * meant to be shared by overlapping callers: two `getHeaders()` calls racing
 * on a stale token each run their own exchange. Serialize access or keep one
 * manager per caller.
 */
export class InstallationCredentialManager {
  /**
   * Octokit instance used for token exchanges. Callers may reuse it for their
   * own requests; it carries no installation credentials of its own.
   */
  readonly client: Octokit

  private state: CredentialState
  private readonly params: Readonly<AuthParameters>
  private readonly now: Clock
  private readonly logger: Logger

  private constructor(
    client: Octokit,
    params: Readonly<AuthParameters>,
    state: CredentialState,
    now: Clock,
    logger: Logger
  ) {
    this.client = client
    this.params = params
    this.state = state
    this.now = now
    this.logger = logger
  }

  /**
   * Validates `params`, builds the shared client and fetches the first token.
   * Rejects if any of those steps fail.
   */
  static async create(
    params: AuthParameters,
    options: CredentialManagerOptions = {}
  ): Promise<InstallationCredentialManager> {
    const validated = parseAuthParameters(params)
    const now = options.now ?? systemClock
    const logger = options.logger ?? consoleLogger

    const client = new Octokit({
      userAgent: validated.userAgent,
      log: octokitLog(logger),
      ...(options.baseUrl ? { baseUrl: options.baseUrl } : {}),
      ...(options.fetch ? { request: { fetch: options.fetch } } : {}),
    })

    const state = await fetchCredentialState(client, validated, now)
    logger.debug(`${LOG_PREFIX} Fetched installation token`, {
      appId: validated.appId,
      installationId: validated.installationId,
      expiresAt: state.expiresAt.toISOString(),
    })

    return new InstallationCredentialManager(client, validated, state, now, logger)
  }

  /**
   * Reads app credentials from the environment (see `@appauth/config`).
   */
  static async fromEnv(
    options: CredentialManagerOptions & { env?: Record<string, string | undefined> } = {}
  ): Promise<InstallationCredentialManager> {
    const { env, ...rest } = options
    const config = loadConfig(env)
    return InstallationCredentialManager.create(configToAuthParameters(config), {
      ...rest,
      baseUrl: rest.baseUrl ?? config.baseUrl,
    })
  }

  /**
   * Returns `{ Authorization: 'token <token>' }`, first fetching a new token
   * if the held one is older than 55 minutes. A failed refresh rejects and
   * keeps the previous token.
   */
  async getHeaders(): Promise<AuthorizationHeaders> {
    await this.refresh()
    return authorizationHeaders(this.state.token)
  }

  isStale(): boolean {
    return isStaleAfter(secondsSince(this.now, this.state.fetchedAt))
  }

  snapshot(): Readonly<CredentialState> {
    return Object.freeze({ ...this.state, expiresAt: new Date(this.state.expiresAt) })
  }

  private async refresh(): Promise<void> {
    const elapsedSeconds = secondsSince(this.now, this.state.fetchedAt)
    if (!isStaleAfter(elapsedSeconds)) {
      return
    }

    this.logger.info(`${LOG_PREFIX} Refreshing installation token`, {
      appId: this.params.appId,
      installationId: this.params.installationId,
      elapsedSeconds,
    })

    this.state = await fetchCredentialState(this.client, this.params, this.now)
  }
}

async function fetchCredentialState(
  client: Octokit,
  params: Readonly<AuthParameters>,
  now: Clock
): Promise<CredentialState> {
  const assertion = await signIdentityAssertion(params, now)
  const response = await exchangeInstallationToken(client, params, assertion)
  return {
    token: response.token,
    fetchedAt: readClock(now),
    expiresAt: response.expiresAt,
  }
}
