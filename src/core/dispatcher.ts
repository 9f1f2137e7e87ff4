/**
 * Request Dispatcher
 * Rate-limits, attaches the selected credential and sends one HTTP request
 */

import { v4 as uuid } from 'uuid';
import { MissingCredentialError, TransportError } from './errors.js';
import { RateLimiter } from './rate-limiter.js';
import { TokenLookup } from './credentials.js';
import {
  CredentialSelection,
  DispatchRequest,
  HttpTransport,
  OutgoingRequest,
  RawResponse
} from './types.js';

export interface DispatcherOptions {
  baseUrl: string;
  accountToken?: string;
  credentials: TokenLookup;
  rateLimiter: RateLimiter;
  transport?: HttpTransport;
  timeoutMs?: number;
  verbose?: boolean;
}

export const fetchTransport: HttpTransport = (request) =>
  fetch(request.url, {
    method: request.method,
    headers: request.headers,
    body: request.body,
    signal: request.signal
  });

export function joinUrl(baseUrl: string, path: string): string {
  return `${baseUrl.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`;
}

/** Empty → null, JSON → parsed value, anything else → the text itself */
export function parseBody(text: string): unknown {
  if (text.trim() === '') return null;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

export class RequestDispatcher {
  private readonly transport: HttpTransport;

  constructor(private readonly options: DispatcherOptions) {
    this.transport = options.transport ?? fetchTransport;
  }

  get hasAccountToken(): boolean {
    return Boolean(this.options.accountToken);
  }

  /**
   * Send one request and hand back the response untouched. Non-2xx statuses
   * are returned, not thrown; only local preconditions and network failures
   * throw. Nothing is retried.
   */
  async dispatch(request: DispatchRequest): Promise<RawResponse> {
    // Checked before acquire() so a misconfigured call costs no slot
    if (request.credential.kind === 'account' && !this.options.accountToken) {
      throw new MissingCredentialError();
    }

    const requestId = uuid().slice(0, 8);
    const url = joinUrl(this.options.baseUrl, request.path);

    await this.options.rateLimiter.acquire();

    const token = this.resolveToken(request.credential);
    const headers: Record<string, string> = {
      ...request.headers,
      Accept: 'application/json'
    };
    if (request.body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }
    if (token) {
      headers['Authorization'] = `Bearer ${token}`;
    }

    const outgoing: OutgoingRequest = {
      method: request.method,
      url,
      headers,
      body: request.body === undefined ? undefined : JSON.stringify(request.body)
    };
    if (this.options.timeoutMs) {
      outgoing.signal = AbortSignal.timeout(this.options.timeoutMs);
    }

    const started = Date.now();
    let response: Response;
    let text: string;
    try {
      response = await this.transport(outgoing);
      text = await response.text();
    } catch (error) {
      const failure = new TransportError(request.method, url, error);
      console.error(`[${requestId}] ${failure.message}`);
      throw failure;
    }

    if (this.options.verbose) {
      console.error(
        `[${requestId}] ${request.method} ${request.path} -> ${response.status} (${Date.now() - started}ms)`
      );
    }

    const responseHeaders: Record<string, string> = {};
    response.headers.forEach((value, key) => {
      responseHeaders[key.toLowerCase()] = value;
    });

    return {
      status: response.status,
      headers: responseHeaders,
      body: parseBody(text)
    };
  }

  private resolveToken(credential: CredentialSelection): string | undefined {
    switch (credential.kind) {
      case 'account':
        return this.options.accountToken;
      case 'agent':
        return this.options.credentials.get(credential.symbol);
      case 'none':
        return undefined;
    }
  }
}
