/**
 * Type definitions for the operations platform client
 */

import type { ProcessingAction } from "../state/schemas/processing-record.js";

// =============================================================================
// Platform Resources
// =============================================================================

/**
 * Identifier entry of a resource key as returned by suite-api
 */
export interface ResourceIdentifier {
  identifierType: { name: string; dataType?: string; isPartOfUniqueness?: boolean };
  value: string;
}

/**
 * Resource key of a suite-api resource
 */
export interface ResourceKey {
  name: string;
  adapterKindKey: string;
  resourceKindKey: string;
  resourceIdentifiers: ResourceIdentifier[];
}

/**
 * A suite-api resource as listed by GET /suite-api/api/resources
 */
export interface PlatformResource {
  identifier: string;
  resourceKey: ResourceKey;
}

/**
 * A virtual machine known to the operations platform
 */
export interface VirtualMachine {
  /** Platform resource identifier */
  id: string;
  /** VM name, used as the processing cache key */
  name: string;
  /** Whether ping monitoring is already on; null when the platform does not say */
  pingEnabled: boolean | null;
  /** The underlying resource, kept for the update payload */
  resource: PlatformResource;
}

/**
 * Result of enabling ping monitoring for one VM
 */
export type EnableOutcome = ProcessingAction;

// =============================================================================
// Authentication
// =============================================================================

/**
 * A token together with its expiry
 */
export interface AcquiredToken {
  token: string;
  expiresAt: Date;
}

/**
 * Source of fresh tokens, consumed by the token manager
 */
export interface TokenProvider {
  acquireToken(): Promise<AcquiredToken>;
}

// =============================================================================
// Client Options
// =============================================================================

export interface RetryOptions {
  /** Maximum retry attempts after the first try. Default: 3 */
  maxRetries?: number;
  /** Base delay for exponential backoff in ms. Default: 1000 */
  baseDelayMs?: number;
  /** Maximum delay between retries in ms. Default: 30000 */
  maxDelayMs?: number;
  /** Random jitter as a fraction of the delay. Default: 0.1 */
  jitterFactor?: number;
}

export interface OperationsCredentials {
  username: string;
  password: string;
  /** Authentication source configured on the platform, e.g. "local" */
  authSource?: string;
}
