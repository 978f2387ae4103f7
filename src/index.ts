// Main clients
export { TM1Client } from './client/tm1.ts'
export type { TTM1ClientOptions } from './client/tm1.ts'
export { TM1Cloud } from './client/tm1-cloud.ts'
export type { TTM1CloudOptions } from './client/tm1-cloud.ts'

// Configuration
export { configFromEnvironment, resolveConfig } from './core/config.ts'
export type { TConnectionConfig, TResolvedConfig } from './core/config.ts'
export { compareVersions, isVersionAtLeast, isV12 } from './core/version.ts'
export { logger, silentLogger } from './core/logger.ts'
export type { TLogger } from './core/logger.ts'
export { withHeader, withQueryValue, withQueryValues } from './core/request-options.ts'
export { Transport } from './core/transport.ts'
export type { TTransportOptions } from './core/transport.ts'

// Providers - Endpoints
export { resolveServiceRoot } from './providers/endpoint/service-root.ts'
export type { TServiceRoot, TTopology } from './providers/endpoint/service-root.ts'

// Providers - Authentication
export { BasicAuth } from './providers/auth/basic-auth.ts'
export { BearerTokenAuth } from './providers/auth/bearer-token-auth.ts'
export { CamNamespaceAuth, CamPassportAuth } from './providers/auth/cam-auth.ts'
export { FunctionAuth } from './providers/auth/function-auth.ts'
export type { TAuthFunction } from './providers/auth/function-auth.ts'
export { HeaderAuth } from './providers/auth/header-auth.ts'
export { IbmCloudApiKeyAuth } from './providers/auth/ibm-cloud-api-key.ts'
export type { TIbmCloudApiKeyOptions } from './providers/auth/ibm-cloud-api-key.ts'
export { SessionCookieAuth } from './providers/auth/session-cookie-auth.ts'
export { createAuthProvider, selectAuthMode } from './providers/auth/auth-mode.ts'
export type { TAuthMode, TAuthModeKind } from './providers/auth/auth-mode.ts'

// Errors
export {
  TM1Error,
  ConfigurationError,
  AuthError,
  HTTPError,
  TransportError,
  TimeoutError,
  AbortOperationError,
  VersionUnsupportedError,
  PrivilegeRequiredError,
  ValidationError,
  NotImplementedError,
  isNotFound,
  mergeErrors,
  withContext,
} from './core/errors.ts'

// Domain helpers
export { ordinalToCoordinates, coordinatesToOrdinal } from './domains/cells/cellset.ts'
export type { TCellMap, TCellProperties } from './domains/cells/cellset.ts'
export { normalizeBatchUrl } from './domains/batch/batch.feature.ts'

// Types
export type {
  THttpMethod,
  TAuthProvider,
  TOutgoingRequest,
  TRequestOption,
  TRequestOptions,
} from './core/types.ts'
export type { TChore, TChoreTask, TChoreExecutionMode } from './domains/chores/chore.ts'
export type { TActiveUser, TUserType } from './domains/users/active-user.ts'
export type { TProcessExecution, TProcessParameters } from './domains/processes/processes.feature.ts'
export type {
  TAuditLogQuery,
  TLoggerLevel,
  TMessageLogQuery,
  TTransactionLogQuery,
} from './domains/server/log-queries.ts'
export type { TLogKind } from './domains/server/server.feature.ts'
export type { TFileContent } from './domains/files/files.api.ts'
export type {
  TBatchRequestDTO,
  TBatchResponseDTO,
  TCellValue,
  TChoreParameter,
  TJob,
  TLogEntry,
  TSession,
  TThread,
} from './types/api.ts'
