/**
 * CLI commands
 */

import { Command } from 'commander';
import { z } from 'zod';
import { Gateway } from '../core/gateway.js';
import { ValidationError, describeError } from '../core/errors.js';
import { registerAgent } from '../core/registration.js';
import { CredentialSelection, Credentials } from '../core/types.js';
import { RegisterSchema, parseArgs } from '../core/validation.js';
import { McpTransportKind } from '../core/config.js';
import { callTool } from '../mcp/tools.js';
import { startStdioServer } from '../mcp/server.js';
import { startSseServer } from '../mcp/http.js';
import { formatAgents, formatRegistration, formatResponse } from './format.js';

const MethodSchema = z
  .string()
  .transform(value => value.toUpperCase())
  .pipe(z.enum(['GET', 'POST', 'PATCH', 'PUT', 'DELETE']));

const ServeOptionsSchema = z.object({
  transport: z.enum(['sse', 'stdio']).optional(),
  host: z.string().min(1).optional(),
  port: z.coerce.number().int().min(0).max(65535).optional()
});

function parseJsonBody(data: string | undefined): unknown {
  if (data === undefined) return undefined;
  try {
    return JSON.parse(data);
  } catch {
    throw new ValidationError('Invalid JSON body');
  }
}

function selectCredential(options: { agent?: string; account?: boolean }): CredentialSelection {
  if (options.agent && options.account) {
    throw new ValidationError('Use either --agent or --account, not both');
  }
  if (options.account) return Credentials.account;
  if (options.agent) return Credentials.agent(options.agent);
  return Credentials.none;
}

/**
 * `openGateway` is called lazily so commands that fail argument parsing
 * never touch the token file.
 */
export function createProgram(openGateway: () => Gateway): Command {
  const program = new Command();

  // Errors become a message and a non-zero exit code
  const run = <A extends unknown[]>(action: (...args: A) => Promise<void> | void) =>
    async (...args: A) => {
      try {
        await action(...args);
      } catch (error) {
        console.error(`Error: ${describeError(error)}`);
        process.exitCode = 1;
      }
    };

  program
    .name('spacetraders-gateway')
    .description('Rate-limited, multi-agent gateway and MCP server for the SpaceTraders API')
    .version('0.1.0');

  program
    .command('serve')
    .description('Start the MCP server')
    .option('-t, --transport <transport>', 'sse or stdio (default from TRANSPORT)')
    .option('--host <host>', 'SSE listen host (default from HOST)')
    .option('-p, --port <port>', 'SSE listen port (default from PORT)')
    .action(run(async (raw: Record<string, unknown>) => {
      const options = parseArgs(ServeOptionsSchema, raw);
      const gateway = openGateway();
      const transport: McpTransportKind = options.transport ?? gateway.config.server.transport;

      if (!gateway.dispatcher.hasAccountToken) {
        console.error('[gateway] Warning: SPACETRADERS_API_KEY is not set; registration and faction tools will fail');
      }

      if (transport === 'stdio') {
        await startStdioServer(gateway);
        return;
      }
      startSseServer(gateway, {
        host: options.host ?? gateway.config.server.host,
        port: options.port ?? gateway.config.server.port
      });
    }));

  program
    .command('register')
    .description('Register a new agent and store its token')
    .argument('<symbol>', 'Agent callsign')
    .argument('[faction]', 'Starting faction', 'COSMIC')
    .action(run(async (symbol: string, faction: string) => {
      const request = parseArgs(RegisterSchema, { symbol, faction });
      const outcome = await registerAgent(openGateway(), request);
      console.log(formatRegistration(outcome));
      if (!outcome.ok) {
        process.exitCode = 1;
      }
    }));

  program
    .command('agents')
    .description('List agents with a stored token')
    .action(run(() => {
      const gateway = openGateway();
      console.log(formatAgents(gateway.credentials.symbols(), gateway.config.tokensFile));
    }));

  program
    .command('request')
    .description('Send one raw request through the gateway')
    .argument('<method>', 'HTTP method')
    .argument('<path>', 'Path relative to the API base URL, e.g. my/agent')
    .option('-a, --agent <symbol>', 'Authenticate as this stored agent')
    .option('--account', 'Authenticate with the account token')
    .option('-d, --data <json>', 'JSON request body')
    .action(run(async (method: string, path: string, options: { agent?: string; account?: boolean; data?: string }) => {
      const response = await openGateway().dispatcher.dispatch({
        method: parseArgs(MethodSchema, method),
        path,
        credential: selectCredential(options),
        body: parseJsonBody(options.data)
      });
      console.log(formatResponse(response));
      if (response.status >= 400) {
        process.exitCode = 1;
      }
    }));

  program
    .command('cooldown')
    .description("Show a ship's reactor cooldown")
    .argument('<agent>', 'Agent symbol')
    .argument('<ship>', 'Ship symbol')
    .action(run(async (agent: string, ship: string) => {
      const result = await callTool(openGateway(), 'get_ship_cooldown', {
        agentSymbol: agent,
        shipSymbol: ship
      });
      for (const item of result.content) {
        if (item.type === 'text') {
          (result.isError ? console.error : console.log)(item.text);
        }
      }
      if (result.isError) {
        process.exitCode = 1;
      }
    }));

  return program;
}
