import { z } from 'zod'
import { InvalidParametersError } from './errors'
import type { AuthParameters } from './types'

const githubIdSchema = z.number().int().nonnegative().safe()

export const authParametersSchema = z.object({
  userAgent: z.string().min(1, 'userAgent must not be empty'),
  privateKey: z.union([
    z.string().min(1, 'privateKey must not be empty'),
    z.instanceof(Uint8Array).refine((bytes) => bytes.length > 0, 'privateKey must not be empty'),
  ]),
  appId: githubIdSchema,
  installationId: githubIdSchema,
})

/**
 * Validates caller input and returns a frozen copy that is safe to hold for
 * the lifetime of a credential manager.
 */
export function parseAuthParameters(input: AuthParameters): Readonly<AuthParameters> {
  const result = authParametersSchema.safeParse(input)
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const path = issue.path.join('.')
      return path ? `${path}: ${issue.message}` : issue.message
    })
    throw new InvalidParametersError(issues, result.error)
  }

  const { privateKey } = result.data
  return Object.freeze({
    ...result.data,
    privateKey: typeof privateKey === 'string' ? privateKey : Uint8Array.from(privateKey),
  })
}
