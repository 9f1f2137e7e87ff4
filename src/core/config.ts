/**
 * Gateway Configuration
 * Read once from the environment and frozen
 */

import { z } from 'zod';
import { ConfigurationError } from './errors.js';

export const DEFAULT_BASE_URL = 'https://api.spacetraders.io/v2';
export const DEFAULT_TOKENS_FILE = 'agent_tokens.json';

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform(value => value === 'true' || value === '1' || value === 'yes');

const EnvSchema = z.object({
  SPACETRADERS_API_KEY: z.string().trim().min(1).optional(),
  SPACETRADERS_BASE_URL: z.string().url().default(DEFAULT_BASE_URL),
  SPACETRADERS_TOKENS_FILE: z.string().min(1).default(DEFAULT_TOKENS_FILE),
  SPACETRADERS_RATE_LIMIT_REQUESTS: z.coerce.number().default(2),
  SPACETRADERS_RATE_LIMIT_PERIOD_MS: z.coerce.number().default(1000),
  SPACETRADERS_TIMEOUT_MS: z.coerce.number().int().min(0).default(30_000),
  SPACETRADERS_VERBOSE: booleanFlag.default('false'),
  TRANSPORT: z.enum(['sse', 'stdio']).default('sse'),
  HOST: z.string().min(1).default('0.0.0.0'),
  PORT: z.coerce.number().int().min(0).max(65535).default(8050)
});

export type McpTransportKind = 'sse' | 'stdio';

export interface GatewayConfig {
  accountToken?: string;
  baseUrl: string;
  tokensFile: string;
  rateLimit: {
    requestsPerPeriod: number;
    periodMs: number;
  };
  /** 0 disables the per-request timeout */
  timeoutMs: number;
  verbose: boolean;
  server: {
    transport: McpTransportKind;
    host: string;
    port: number;
  };
}

/** Empty strings count as unset, the way a blank line in .env reads */
function withoutBlanks(env: NodeJS.ProcessEnv): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      result[key] = value;
    }
  }
  return result;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<GatewayConfig> {
  const parsed = EnvSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    throw ConfigurationError.fromZod(parsed.error);
  }

  const vars = parsed.data;
  const config: GatewayConfig = {
    baseUrl: vars.SPACETRADERS_BASE_URL,
    tokensFile: vars.SPACETRADERS_TOKENS_FILE,
    rateLimit: {
      requestsPerPeriod: vars.SPACETRADERS_RATE_LIMIT_REQUESTS,
      periodMs: vars.SPACETRADERS_RATE_LIMIT_PERIOD_MS
    },
    timeoutMs: vars.SPACETRADERS_TIMEOUT_MS,
    verbose: vars.SPACETRADERS_VERBOSE,
    server: {
      transport: vars.TRANSPORT,
      host: vars.HOST,
      port: vars.PORT
    }
  };
  if (vars.SPACETRADERS_API_KEY) {
    config.accountToken = vars.SPACETRADERS_API_KEY;
  }

  Object.freeze(config.rateLimit);
  Object.freeze(config.server);
  return Object.freeze(config);
}
