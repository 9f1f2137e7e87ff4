/**
 * SpaceTraders MCP Server
 * Model Context Protocol server exposing the gateway's tools and resources
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  ListResourcesRequestSchema,
  ReadResourceRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { Gateway } from '../core/gateway.js';
import { expectData } from '../core/envelope.js';
import { Credentials } from '../core/types.js';
import { TOOLS, callTool } from './tools.js';

export const SERVER_NAME = 'spacetraders-gateway';
export const SERVER_VERSION = '0.1.0';

const RESOURCES = [
  {
    uri: 'spacetraders://agents',
    name: 'Stored Agents',
    description: 'Agent symbols this gateway holds tokens for',
    mimeType: 'application/json'
  },
  {
    uri: 'spacetraders://status',
    name: 'Server Status',
    description: 'Game server status, reset dates and leaderboards',
    mimeType: 'application/json'
  }
] as const;

/**
 * One Server per connection; every server built from the same gateway
 * shares its rate limit and credential store.
 */
export function createMcpServer(gateway: Gateway): Server {
  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
        resources: {},
      },
    }
  );

  // ==========================================================================
  // TOOLS
  // ==========================================================================

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return {
      tools: TOOLS.map(tool => ({
        name: tool.name,
        description: tool.description,
        inputSchema: tool.inputSchema
      }))
    };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    return callTool(gateway, name, args);
  });

  // ==========================================================================
  // RESOURCES
  // ==========================================================================

  server.setRequestHandler(ListResourcesRequestSchema, async () => {
    return { resources: [...RESOURCES] };
  });

  server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
    const { uri } = request.params;
    let data: unknown;

    switch (uri) {
      case 'spacetraders://agents':
        data = { agents: gateway.credentials.symbols() };
        break;
      case 'spacetraders://status': {
        const response = await gateway.dispatcher.dispatch({
          method: 'GET', path: '', credential: Credentials.none
        });
        const result = expectData(response, 200);
        data = result.kind === 'ok' ? result.data : null;
        break;
      }
      default:
        throw new Error(`Unknown resource: ${uri}`);
    }

    return {
      contents: [
        {
          uri,
          mimeType: 'application/json',
          text: JSON.stringify(data, null, 2)
        }
      ]
    };
  });

  return server;
}

// ============================================================================
// STDIO
// ============================================================================

export async function startStdioServer(gateway: Gateway): Promise<Server> {
  const server = createMcpServer(gateway);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error('[mcp] SpaceTraders MCP server running on stdio');
  return server;
}
