import type { Octokit } from '@octokit/rest'
import { RequestError as OctokitRequestError } from '@octokit/request-error'
import { z } from 'zod'
import { RequestError } from './errors'
import type { AuthParameters, InstallationTokenResponse } from './types'

export const MACHINE_MAN_PREVIEW = 'application/vnd.github.machine-man-preview+json'

export const ACCESS_TOKENS_ROUTE = 'POST /app/installations/{installation_id}/access_tokens'

export const installationTokenResponseSchema = z.object({
  token: z.string(),
  expires_at: z.string().datetime({ offset: true }),
})

export function parseInstallationTokenResponse(
  payload: unknown,
  status?: number
): InstallationTokenResponse {
  const result = installationTokenResponseSchema.safeParse(payload)
  if (!result.success) {
    const fields = result.error.issues.map((issue) => issue.path.join('.') || '(root)')
    throw new RequestError({
      message: `Malformed installation token response (${fields.join(', ')})`,
      status,
      body: payload,
      cause: result.error,
    })
  }

  return {
    token: result.data.token,
    expiresAt: new Date(result.data.expires_at),
  }
}

function toRequestError(error: unknown, installationId: number): RequestError {
  if (error instanceof RequestError) {
    return error
  }

  if (error instanceof OctokitRequestError) {
    return new RequestError({
      message: `Failed to mint installation token for installation ${installationId} (${error.status}): ${error.message}`,
      status: error.status,
      body: error.response?.data,
      cause: error,
    })
  }

  return new RequestError({
    message: `Failed to mint installation token for installation ${installationId}: ${
      error instanceof Error ? error.message : String(error)
    }`,
    cause: error,
  })
}

/**
 * Trades a signed app JWT for an installation access token. One request per
 * call; nothing is cached or retried here.
 */
export async function exchangeInstallationToken(
  client: Octokit,
  params: Pick<AuthParameters, 'installationId'>,
  assertion: string
): Promise<InstallationTokenResponse> {
  try {
    const response = await client.request(ACCESS_TOKENS_ROUTE, {
      installation_id: params.installationId,
      headers: {
        authorization: `Bearer ${assertion}`,
        accept: MACHINE_MAN_PREVIEW,
      },
    })
    return parseInstallationTokenResponse(response.data, response.status)
  } catch (error) {
    throw toRequestError(error, params.installationId)
  }
}
