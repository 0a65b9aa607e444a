import { createPrivateKey, type KeyObject } from 'node:crypto'
import { SignJWT } from 'jose'
import { readClock, type Clock } from './clock'
import { SigningError } from './errors'
import type { AuthParameters, IdentityAssertionClaims } from './types'

// Each assertion backs exactly one token exchange.
export const ASSERTION_LIFETIME_SECONDS = 60

export const ASSERTION_ALGORITHM = 'RS256'

export function buildAssertionClaims(
  params: Pick<AuthParameters, 'appId'>,
  now: number
): IdentityAssertionClaims {
  const iat = Math.floor(now)
  return {
    iat,
    exp: iat + ASSERTION_LIFETIME_SECONDS,
    iss: String(params.appId),
  }
}

function loadPrivateKey(privateKey: AuthParameters['privateKey']): KeyObject {
  try {
    return createPrivateKey({
      key: typeof privateKey === 'string' ? privateKey : Buffer.from(privateKey),
      format: 'pem',
    })
  } catch (error) {
    throw new SigningError('Failed to load GitHub App private key', error)
  }
}

/**
 * Signs the JWT a GitHub App presents as `Authorization: Bearer` when it asks
 * for an installation token.
 */
export async function signIdentityAssertion(
  params: Pick<AuthParameters, 'appId' | 'privateKey'>,
  clock: Clock
): Promise<string> {
  const claims = buildAssertionClaims(params, readClock(clock))
  const key = loadPrivateKey(params.privateKey)

  try {
    return await new SignJWT({ ...claims })
      .setProtectedHeader({ alg: ASSERTION_ALGORITHM, typ: 'JWT' })
      .sign(key)
  } catch (error) {
    throw new SigningError('Failed to sign GitHub App JWT', error)
  }
}
