import { readFileSync } from 'node:fs'
import { z } from 'zod'

const numericId = (name: string) =>
  z
    .string({ required_error: `${name} is required` })
    .trim()
    .regex(/^\d+$/, `${name} must be a non-negative integer`)
    .transform(Number)
    .refine(Number.isSafeInteger, `${name} is too large`)

export const envSchema = z.object({
  GITHUB_APP_ID: numericId('GITHUB_APP_ID'),
  GITHUB_APP_INSTALLATION_ID: numericId('GITHUB_APP_INSTALLATION_ID'),
  // PEM text. Literal "\n" sequences are expanded so the key fits on one line.
  GITHUB_APP_PRIVATE_KEY: z.string().optional(),
  GITHUB_APP_PRIVATE_KEY_PATH: z.string().optional(),
  GITHUB_APP_USER_AGENT: z
    .string({ required_error: 'GITHUB_APP_USER_AGENT is required' })
    .trim()
    .min(1, 'GITHUB_APP_USER_AGENT must not be empty'),
  // Override for GitHub Enterprise Server
  GITHUB_API_BASE_URL: z.string().url().default('https://api.github.com'),
})

export type Env = z.infer<typeof envSchema>

export interface Config {
  appId: number
  installationId: number
  privateKey: string
  userAgent: string
  baseUrl: string
}

export class ConfigError extends Error {
  readonly issues: string[]

  constructor(issues: string[]) {
    super(`Invalid environment configuration: ${issues.join('; ')}`)
    this.name = 'ConfigError'
    this.issues = issues
  }
}

let cachedConfig: Config | null = null

function resolvePrivateKey(env: Env): string {
  const inline = env.GITHUB_APP_PRIVATE_KEY?.trim()
  if (inline) {
    return inline.replace(/\\n/g, '\n')
  }

  const path = env.GITHUB_APP_PRIVATE_KEY_PATH?.trim()
  if (path) {
    let contents: string
    try {
      contents = readFileSync(path, 'utf8')
    } catch (error) {
      throw new ConfigError([
        `GITHUB_APP_PRIVATE_KEY_PATH could not be read: ${
          error instanceof Error ? error.message : String(error)
        }`,
      ])
    }
    if (!contents.trim()) {
      throw new ConfigError([`GITHUB_APP_PRIVATE_KEY_PATH points at an empty file: ${path}`])
    }
    return contents
  }

  throw new ConfigError(['GITHUB_APP_PRIVATE_KEY or GITHUB_APP_PRIVATE_KEY_PATH is required'])
}

export function parseConfig(source: Record<string, string | undefined>): Config {
  const result = envSchema.safeParse(source)

  if (!result.success) {
    throw new ConfigError(result.error.issues.map((issue) => issue.message))
  }

  const env = result.data
  return {
    appId: env.GITHUB_APP_ID,
    installationId: env.GITHUB_APP_INSTALLATION_ID,
    privateKey: resolvePrivateKey(env),
    userAgent: env.GITHUB_APP_USER_AGENT,
    baseUrl: env.GITHUB_API_BASE_URL.replace(/\/+$/, ''),
  }
}

/**
 * Reads GitHub App settings from `process.env`, caching the result. Passing
 * `env` parses that object instead and skips the cache.
 */
export function loadConfig(env?: Record<string, string | undefined>): Config {
  if (env) {
    return parseConfig(env)
  }

  if (cachedConfig) {
    return cachedConfig
  }

  cachedConfig = parseConfig(process.env)
  return cachedConfig
}

export function resetConfigCache(): void {
  cachedConfig = null
}
