/**
 * Gateway Types
 * Shared shapes for credentials, requests and responses
 */

// ============================================================================
// CREDENTIALS
// ============================================================================

/** Identity symbol → bearer token. Symbols are case-preserving. */
export type TokenSet = Record<string, string>;

/**
 * Which bearer token a request carries.
 * `agent` falls back to an unauthenticated request when the agent has no
 * stored token; public endpoints are reached that way.
 */
export type CredentialSelection =
  | { kind: 'account' }
  | { kind: 'agent'; symbol: string }
  | { kind: 'none' };

const ACCOUNT: CredentialSelection = { kind: 'account' };
const NONE: CredentialSelection = { kind: 'none' };

export const Credentials = {
  account: ACCOUNT,
  none: NONE,
  agent: (symbol: string): CredentialSelection => ({ kind: 'agent', symbol })
};

// ============================================================================
// REQUESTS & RESPONSES
// ============================================================================

export type HttpMethod = 'GET' | 'POST' | 'PATCH' | 'PUT' | 'DELETE';

export interface DispatchRequest {
  method: HttpMethod;
  /** Relative to the configured base URL, with or without a leading slash */
  path: string;
  credential: CredentialSelection;
  /** Serialized as JSON when present */
  body?: unknown;
  headers?: Record<string, string>;
}

export interface RawResponse {
  status: number;
  /** Lower-cased header names */
  headers: Record<string, string>;
  /** Parsed JSON, the raw text when it is not JSON, or null when empty */
  body: unknown;
}

/** What the dispatcher hands to the HTTP layer */
export interface OutgoingRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: string;
  signal?: AbortSignal;
}

export type HttpTransport = (request: OutgoingRequest) => Promise<Response>;

// ============================================================================
// TIME
// ============================================================================

export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise(resolve => setTimeout(resolve, ms))
};
