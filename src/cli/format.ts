/**
 * CLI output formatting
 */

import { RawResponse } from '../core/types.js';
import { RegistrationOutcome } from '../core/registration.js';

export function formatAgents(symbols: readonly string[], tokensFile: string): string {
  if (symbols.length === 0) {
    return `No agents stored in ${tokensFile}. Run: spacetraders-gateway register <symbol> [faction]`;
  }

  const lines = [`${symbols.length} agent(s) in ${tokensFile}:`];
  for (const symbol of symbols) {
    lines.push(`  • ${symbol}`);
  }
  return lines.join('\n');
}

export function formatResponse(response: RawResponse): string {
  const header = `HTTP ${response.status}`;
  if (response.body === null) {
    return header;
  }
  const body = typeof response.body === 'string'
    ? response.body
    : JSON.stringify(response.body, null, 2);
  return `${header}\n${body}`;
}

export function formatRegistration(outcome: RegistrationOutcome): string {
  if (!outcome.ok) {
    return `Registration failed: ${outcome.message} (Status code: ${outcome.status})`;
  }
  return `Registered ${outcome.symbol} (${outcome.faction}). Token stored.`;
}
