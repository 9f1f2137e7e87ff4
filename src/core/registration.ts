/**
 * Agent Registration
 * The one call-site that writes to the credential store
 */

import { z } from 'zod';
import { CredentialStore } from './credentials.js';
import { RequestDispatcher } from './dispatcher.js';
import { RemoteError } from './errors.js';
import { interpretResponse } from './envelope.js';
import { Credentials } from './types.js';
import { RegisterRequest } from './validation.js';

const RegisterResponseSchema = z.object({
  data: z.object({
    token: z.string().min(1),
    agent: z.object({
      symbol: z.string().min(1),
      startingFaction: z.string()
    }).passthrough()
  }).passthrough()
});

export type RegisteredAgent = z.infer<typeof RegisterResponseSchema>['data']['agent'];

export type RegistrationOutcome =
  | { ok: true; symbol: string; faction: string; agent: RegisteredAgent }
  | { ok: false; status: number; message: string };

export interface RegistrationDeps {
  dispatcher: RequestDispatcher;
  credentials: CredentialStore;
}

/**
 * Create an agent with the account token and store the token it is issued,
 * under the symbol the remote side reports back.
 */
export async function registerAgent(
  { dispatcher, credentials }: RegistrationDeps,
  request: RegisterRequest
): Promise<RegistrationOutcome> {
  const response = await dispatcher.dispatch({
    method: 'POST',
    path: 'register',
    credential: Credentials.account,
    body: { symbol: request.symbol, faction: request.faction }
  });

  const result = interpretResponse(response, 201);
  if (result.kind === 'error') {
    return { ok: false, status: result.status, message: result.message };
  }
  if (response.status !== 201) {
    return { ok: false, status: response.status, message: `Unexpected status ${response.status}` };
  }

  const parsed = RegisterResponseSchema.safeParse(response.body);
  if (!parsed.success) {
    throw new RemoteError(response.status, 'Registration response is missing the agent token or symbol');
  }

  const { token, agent } = parsed.data.data;
  credentials.store(agent.symbol, token);
  console.error(`[gateway] Stored token for agent ${agent.symbol}`);

  return { ok: true, symbol: agent.symbol, faction: agent.startingFaction, agent };
}
