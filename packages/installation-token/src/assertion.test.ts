import { createPublicKey, generateKeyPairSync } from 'node:crypto'
import { compactVerify, decodeJwt, decodeProtectedHeader } from 'jose'
import { describe, expect, it } from 'vitest'
import { buildAssertionClaims, signIdentityAssertion } from './assertion'
import { SigningError, TimeError } from './errors'
import { rsaKeys } from './test-helpers'

describe('buildAssertionClaims', () => {
  it('issues for the app id and expires 60 seconds later', () => {
    expect(buildAssertionClaims({ appId: 1234 }, 1_700_000_000)).toEqual({
      iat: 1_700_000_000,
      exp: 1_700_000_060,
      iss: '1234',
    })
  })

  it('truncates fractional clock readings', () => {
    const claims = buildAssertionClaims({ appId: 7 }, 1_700_000_000.9)
    expect(claims.iat).toBe(1_700_000_000)
    expect(claims.exp - claims.iat).toBe(60)
  })
})

describe('signIdentityAssertion', () => {
  it('signs an RS256 JWT verifiable with the app public key', async () => {
    const jwt = await signIdentityAssertion(
      { appId: 1234, privateKey: rsaKeys.privateKey },
      () => 1_700_000_000
    )

    expect(decodeProtectedHeader(jwt)).toEqual({ alg: 'RS256', typ: 'JWT' })
    expect(decodeJwt(jwt)).toEqual({ iat: 1_700_000_000, exp: 1_700_000_060, iss: '1234' })
    await expect(compactVerify(jwt, createPublicKey(rsaKeys.publicKey))).resolves.toBeDefined()
  })

  it('accepts PKCS#8 key bytes', async () => {
    const pkcs8 = generateKeyPairSync('rsa', {
      modulusLength: 2048,
      publicKeyEncoding: { type: 'spki', format: 'pem' },
      privateKeyEncoding: { type: 'pkcs8', format: 'pem' },
    })

    const jwt = await signIdentityAssertion(
      { appId: 99, privateKey: new TextEncoder().encode(pkcs8.privateKey) },
      () => 1_600_000_000
    )

    expect(decodeJwt(jwt).iss).toBe('99')
    await expect(compactVerify(jwt, createPublicKey(pkcs8.publicKey))).resolves.toBeDefined()
  })

  it('rejects key material that is not a PEM private key', async () => {
    await expect(
      signIdentityAssertion({ appId: 1, privateKey: 'not a key' }, () => 1_700_000_000)
    ).rejects.toBeInstanceOf(SigningError)
  })

  it('rejects keys that cannot produce RS256 signatures', async () => {
    const ec = generateKeyPairSync('ec', {
      namedCurve: 'prime256v1',
      publicKeyEncoding: { type: 'spki', format: 'pem' },
      privateKeyEncoding: { type: 'pkcs8', format: 'pem' },
    })

    const error = await signIdentityAssertion(
      { appId: 1, privateKey: ec.privateKey },
      () => 1_700_000_000
    ).catch((caught: unknown) => caught)

    expect(error).toBeInstanceOf(SigningError)
    expect(error).toMatchObject({ kind: 'signing', message: 'Failed to sign GitHub App JWT' })
  })

  it('fails with a time error when the clock reads before the epoch', async () => {
    await expect(
      signIdentityAssertion({ appId: 1, privateKey: rsaKeys.privateKey }, () => -5)
    ).rejects.toBeInstanceOf(TimeError)
  })

  it('fails with a time error when the clock is unreadable', async () => {
    await expect(
      signIdentityAssertion({ appId: 1, privateKey: rsaKeys.privateKey }, () => Number.NaN)
    ).rejects.toThrow('Clock returned a non-finite reading: NaN')
  })
})
