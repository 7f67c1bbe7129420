/**
 * REST client for the operations platform (suite-api)
 *
 * Acquires tokens, lists the VM inventory and switches on ping monitoring by
 * updating the `isPingEnabled` resource identifier of a VM.
 *
 * Every request carries a finite timeout. Timeouts, connection failures and
 * transient statuses (408, 429, 5xx) are retried with exponential backoff;
 * a 401 is raised as {@link UnauthorizedError} straight away so the caller can
 * refresh its token.
 */

import { z } from "zod";
import { systemClock, type Clock } from "../scheduler/clock.js";
import type { MonitoringPlatform } from "../runner/types.js";
import { createDefaultLogger, errorMessage, type Logger } from "../utils/logger.js";
import {
  NetworkError,
  OperationsApiError,
  UnauthorizedError,
  UnexpectedResponseError,
  VmNotFoundError,
} from "./errors.js";
import { calculateBackoffDelay, resolveRetryOptions } from "./retry.js";
import type {
  AcquiredToken,
  EnableOutcome,
  OperationsCredentials,
  PlatformResource,
  ResourceIdentifier,
  RetryOptions,
  TokenProvider,
  VirtualMachine,
} from "./types.js";

// =============================================================================
// Response Schemas
// =============================================================================

const TokenResponseSchema = z.object({
  token: z.string().min(1),
  /** Expiry as epoch milliseconds */
  validity: z.number().optional(),
});

const ResourceIdentifierSchema = z.object({
  identifierType: z.object({
    name: z.string(),
    dataType: z.string().optional(),
    isPartOfUniqueness: z.boolean().optional(),
  }),
  value: z.string().default(""),
});

const PlatformResourceSchema = z.object({
  identifier: z.string(),
  resourceKey: z.object({
    name: z.string(),
    adapterKindKey: z.string(),
    resourceKindKey: z.string(),
    resourceIdentifiers: z.array(ResourceIdentifierSchema).default([]),
  }),
});

const ResourceListSchema = z.object({
  resourceList: z.array(PlatformResourceSchema).default([]),
});

// =============================================================================
// Constants
// =============================================================================

const API_BASE_PATH = "/suite-api/api";
const TOKEN_ENDPOINT = `${API_BASE_PATH}/auth/token/acquire`;
const RESOURCES_ENDPOINT = `${API_BASE_PATH}/resources`;

const VM_QUERY = { resourceKind: "VirtualMachine", adapterKind: "VMWARE" } as const;

const PING_IDENTIFIER = "isPingEnabled";

/** Identifiers the platform needs to match the VM in an update */
const UPDATE_IDENTIFIERS = new Set([
  PING_IDENTIFIER,
  "VMEntityName",
  "VMEntityObjectID",
  "VMEntityVCID",
]);

const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;
const DEFAULT_TOKEN_TTL_MS = 6 * 60 * 60 * 1000;

// =============================================================================
// Types
// =============================================================================

export interface OperationsClientOptions {
  /** Platform host, FQDN or host:port */
  host: string;
  credentials: OperationsCredentials;
  /** Per-request timeout in ms. Default: 30000 */
  requestTimeoutMs?: number;
  retry?: RetryOptions;
  /** Token lifetime assumed when the platform reports none. Default: 6h */
  defaultTokenTtlMs?: number;
  clock?: Clock;
  logger?: Logger;
  /** Source of jitter for backoff delays. Default: Math.random */
  random?: () => number;
}

interface RequestOptions {
  query?: Record<string, string>;
  token?: string;
  body?: unknown;
}

// =============================================================================
// Helpers
// =============================================================================

function findIdentifier(
  resource: PlatformResource,
  name: string
): ResourceIdentifier | undefined {
  return resource.resourceKey.resourceIdentifiers.find(
    (identifier) => identifier.identifierType.name === name
  );
}

/**
 * Map a platform resource to a VM
 */
export function toVirtualMachine(resource: PlatformResource): VirtualMachine {
  const ping = findIdentifier(resource, PING_IDENTIFIER);
  return {
    id: resource.identifier,
    name: resource.resourceKey.name,
    pingEnabled: ping === undefined ? null : ping.value.toLowerCase() === "true",
    resource,
  };
}

/**
 * Build the minimal PUT payload that turns ping monitoring on
 *
 * A resource without an `isPingEnabled` identifier gets one appended.
 */
export function buildPingUpdatePayload(resource: PlatformResource): PlatformResource {
  const identifiers = resource.resourceKey.resourceIdentifiers
    .filter((identifier) => UPDATE_IDENTIFIERS.has(identifier.identifierType.name))
    .map((identifier) =>
      identifier.identifierType.name === PING_IDENTIFIER
        ? { ...identifier, value: "true" }
        : identifier
    );

  if (!identifiers.some((identifier) => identifier.identifierType.name === PING_IDENTIFIER)) {
    identifiers.push({ identifierType: { name: PING_IDENTIFIER }, value: "true" });
  }

  return {
    identifier: resource.identifier,
    resourceKey: {
      name: resource.resourceKey.name,
      adapterKindKey: "VMWARE",
      resourceKindKey: "VirtualMachine",
      resourceIdentifiers: identifiers,
    },
  };
}

function isTimeout(error: unknown): boolean {
  return (
    error instanceof Error &&
    (error.name === "TimeoutError" || error.name === "AbortError")
  );
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

// =============================================================================
// Client
// =============================================================================

export class OperationsClient implements MonitoringPlatform, TokenProvider {
  readonly host: string;

  private readonly baseUrl: string;
  private readonly credentials: OperationsCredentials;
  private readonly requestTimeoutMs: number;
  private readonly retryOptions: Required<RetryOptions>;
  private readonly defaultTokenTtlMs: number;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly random: () => number;

  constructor(options: OperationsClientOptions) {
    this.host = options.host;
    this.baseUrl = `https://${options.host}`;
    this.credentials = options.credentials;
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.retryOptions = resolveRetryOptions(options.retry);
    this.defaultTokenTtlMs = options.defaultTokenTtlMs ?? DEFAULT_TOKEN_TTL_MS;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createDefaultLogger("operations");
    this.random = options.random ?? Math.random;
  }

  // ===========================================================================
  // Authentication
  // ===========================================================================

  /**
   * Exchange the configured credentials for a token
   */
  async acquireToken(): Promise<AcquiredToken> {
    const body: Record<string, string> = {
      username: this.credentials.username,
      password: this.credentials.password,
    };
    if (this.credentials.authSource !== undefined) {
      body.authSource = this.credentials.authSource;
    }

    const raw = await this.request("POST", TOKEN_ENDPOINT, { body });
    const response = this.parse(TokenResponseSchema, raw, TOKEN_ENDPOINT);

    const expiresAt =
      response.validity !== undefined
        ? new Date(response.validity)
        : new Date(this.clock.now().getTime() + this.defaultTokenTtlMs);

    this.logger.debug(`Acquired token valid until ${expiresAt.toISOString()}`);
    return { token: response.token, expiresAt };
  }

  // ===========================================================================
  // Inventory
  // ===========================================================================

  /**
   * List every VM known to the platform, in platform order
   */
  async listVirtualMachines(token: string): Promise<VirtualMachine[]> {
    const resources = await this.listResources({ ...VM_QUERY }, token);
    this.logger.debug(`Fetched ${resources.length} VMs from ${this.host}`);
    return resources.map(toVirtualMachine);
  }

  /**
   * Look up a VM by exact name
   *
   * @returns The VM, or null when the platform has no VM of that name
   */
  async findVirtualMachine(name: string, token: string): Promise<VirtualMachine | null> {
    const resources = await this.listResources({ ...VM_QUERY, name }, token);
    const match = resources.find((resource) => resource.resourceKey.name === name);
    return match === undefined ? null : toVirtualMachine(match);
  }

  // ===========================================================================
  // Ping Monitoring
  // ===========================================================================

  /**
   * Turn on ping monitoring for a VM
   *
   * @throws {VmNotFoundError} When a VM given by name does not exist
   */
  async enablePingMonitoring(
    target: VirtualMachine | string,
    token: string
  ): Promise<EnableOutcome> {
    const vm = typeof target === "string" ? await this.resolveByName(target, token) : target;

    if (vm.pingEnabled === true) {
      this.logger.debug(`Ping monitoring already enabled for ${vm.name}`);
      return "already_enabled";
    }

    await this.request("PUT", RESOURCES_ENDPOINT, {
      query: { _no_links: "true" },
      token,
      body: buildPingUpdatePayload(vm.resource),
    });

    this.logger.info(`Enabled ping monitoring for ${vm.name}`);
    return "ping_enabled";
  }

  private async resolveByName(name: string, token: string): Promise<VirtualMachine> {
    const vm = await this.findVirtualMachine(name, token);
    if (vm === null) {
      throw new VmNotFoundError(name);
    }
    return vm;
  }

  // ===========================================================================
  // Transport
  // ===========================================================================

  private async listResources(
    query: Record<string, string>,
    token: string
  ): Promise<PlatformResource[]> {
    const raw = await this.request("GET", RESOURCES_ENDPOINT, { query, token });
    return this.parse(ResourceListSchema, raw, RESOURCES_ENDPOINT).resourceList;
  }

  private parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown, endpoint: string): T {
    const result = schema.safeParse(raw);
    if (!result.success) {
      throw new UnexpectedResponseError(
        `Unexpected response from ${endpoint}: ${formatIssues(result.error)}`,
        endpoint,
        { cause: result.error }
      );
    }
    return result.data;
  }

  /**
   * Send a request, retrying transient failures
   *
   * @returns The parsed JSON body, or null for an empty body
   */
  private async request(
    method: "GET" | "POST" | "PUT",
    endpoint: string,
    options: RequestOptions
  ): Promise<unknown> {
    const url = new URL(`${this.baseUrl}${endpoint}`);
    for (const [key, value] of Object.entries(options.query ?? {})) {
      url.searchParams.set(key, value);
    }

    const headers: Record<string, string> = {
      Accept: "application/json",
      "Content-Type": "application/json",
    };
    if (options.token !== undefined) {
      headers.Authorization = `OpsToken ${options.token}`;
    }

    for (let attempt = 0; ; attempt++) {
      try {
        return await this.send(method, url, endpoint, headers, options.body);
      } catch (error) {
        if (
          error instanceof NetworkError &&
          error.isRetryable() &&
          attempt < this.retryOptions.maxRetries
        ) {
          const delay = calculateBackoffDelay(attempt, this.retryOptions, this.random);
          this.logger.warn(
            `${error.message}; retrying in ${delay}ms (attempt ${attempt + 1} of ${this.retryOptions.maxRetries})`
          );
          await this.clock.sleep(delay);
          continue;
        }
        throw error;
      }
    }
  }

  private async send(
    method: string,
    url: URL,
    endpoint: string,
    headers: Record<string, string>,
    body: unknown
  ): Promise<unknown> {
    let response: Response;
    try {
      response = await fetch(url, {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: AbortSignal.timeout(this.requestTimeoutMs),
      });
    } catch (error) {
      const message = isTimeout(error)
        ? `Request to ${endpoint} timed out after ${this.requestTimeoutMs}ms`
        : `Failed to connect to ${this.host}: ${errorMessage(error)}`;
      throw new NetworkError(message, {
        endpoint,
        cause: error instanceof Error ? error : undefined,
      });
    }

    const text = await response.text();

    if (!response.ok) {
      if (response.status === 401) {
        throw new UnauthorizedError(endpoint);
      }

      const detail = text.trim() === "" ? response.statusText : text.trim().slice(0, 200);
      const message = `${method} ${endpoint} failed with ${response.status}: ${detail}`;
      const transient = new NetworkError(message, { endpoint, statusCode: response.status });
      if (transient.isRetryable()) {
        throw transient;
      }
      throw new OperationsApiError(message, { statusCode: response.status, endpoint });
    }

    if (text.trim() === "") {
      return null;
    }

    try {
      return JSON.parse(text);
    } catch (error) {
      throw new UnexpectedResponseError(
        `Invalid JSON in response from ${endpoint}`,
        endpoint,
        { cause: error instanceof Error ? error : undefined }
      );
    }
  }
}
