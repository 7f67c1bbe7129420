/**
 * Operations platform module
 *
 * REST client for the monitoring platform and the token manager in front of it.
 */

export {
  OperationsError,
  OperationsApiError,
  UnauthorizedError,
  NetworkError,
  AuthError,
  VmNotFoundError,
  UnexpectedResponseError,
} from "./errors.js";

export type {
  ResourceIdentifier,
  ResourceKey,
  PlatformResource,
  VirtualMachine,
  EnableOutcome,
  AcquiredToken,
  TokenProvider,
  RetryOptions,
  OperationsCredentials,
} from "./types.js";

export {
  DEFAULT_RETRY_OPTIONS,
  resolveRetryOptions,
  calculateBackoffDelay,
} from "./retry.js";

export {
  OperationsClient,
  toVirtualMachine,
  buildPingUpdatePayload,
  type OperationsClientOptions,
} from "./client.js";

export { TokenManager, type TokenManagerOptions } from "./token-manager.js";
