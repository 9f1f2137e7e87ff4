/**
 * Gateway composition
 * One instance per process, handed by reference to every call-site
 */

import { GatewayConfig } from './config.js';
import { CredentialStore } from './credentials.js';
import { RequestDispatcher } from './dispatcher.js';
import { IntervalRateLimiter } from './rate-limiter.js';
import { Clock, HttpTransport } from './types.js';

export interface Gateway {
  config: Readonly<GatewayConfig>;
  credentials: CredentialStore;
  rateLimiter: IntervalRateLimiter;
  dispatcher: RequestDispatcher;
}

export interface GatewayOverrides {
  transport?: HttpTransport;
  clock?: Clock;
}

export function createGateway(
  config: Readonly<GatewayConfig>,
  overrides: GatewayOverrides = {}
): Gateway {
  const credentials = CredentialStore.load(config.tokensFile);
  const rateLimiter = new IntervalRateLimiter({
    requestsPerPeriod: config.rateLimit.requestsPerPeriod,
    periodMs: config.rateLimit.periodMs,
    clock: overrides.clock
  });
  const dispatcher = new RequestDispatcher({
    baseUrl: config.baseUrl,
    accountToken: config.accountToken,
    credentials,
    rateLimiter,
    transport: overrides.transport,
    timeoutMs: config.timeoutMs,
    verbose: config.verbose
  });

  return { config, credentials, rateLimiter, dispatcher };
}
