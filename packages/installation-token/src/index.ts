export {
  InstallationCredentialManager,
  REFRESH_AFTER_SECONDS,
  authorizationHeaders,
  configToAuthParameters,
  isStaleAfter,
} from './credential-manager'
export {
  ASSERTION_ALGORITHM,
  ASSERTION_LIFETIME_SECONDS,
  buildAssertionClaims,
  signIdentityAssertion,
} from './assertion'
export {
  ACCESS_TOKENS_ROUTE,
  MACHINE_MAN_PREVIEW,
  exchangeInstallationToken,
  installationTokenResponseSchema,
  parseInstallationTokenResponse,
} from './exchange'
export { authParametersSchema, parseAuthParameters } from './parameters'
export { readClock, secondsSince, systemClock, type Clock } from './clock'
export {
  HeaderEncodingError,
  InstallationAuthError,
  InvalidParametersError,
  RequestError,
  SigningError,
  TimeError,
  isInstallationAuthError,
  type AnyInstallationAuthError,
  type InstallationAuthErrorKind,
} from './errors'
export type {
  AuthParameters,
  AuthorizationHeaders,
  CredentialManagerOptions,
  CredentialState,
  IdentityAssertionClaims,
  InstallationTokenResponse,
  Logger,
} from './types'
