/**
 * SSE host for the MCP server
 * GET /sse opens a session, POST /messages?sessionId= feeds it
 */

import { Hono } from 'hono';
import { serve, type HttpBindings } from '@hono/node-server';
import { RESPONSE_ALREADY_SENT } from '@hono/node-server/utils/response';
import { SSEServerTransport } from '@modelcontextprotocol/sdk/server/sse.js';
import type { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { Gateway } from '../core/gateway.js';
import { createMcpServer } from './server.js';

interface Session {
  transport: SSEServerTransport;
  server: Server;
}

export interface SseOptions {
  host: string;
  port: number;
}

export function createSseApp(gateway: Gateway) {
  const app = new Hono<{ Bindings: HttpBindings }>();
  const sessions = new Map<string, Session>();

  app.get('/health', (c) => {
    return c.json({
      status: 'ok',
      sessions: sessions.size,
      agents: gateway.credentials.symbols().length
    });
  });

  app.get('/sse', async (c) => {
    const transport = new SSEServerTransport('/messages', c.env.outgoing);
    const server = createMcpServer(gateway);
    const { sessionId } = transport;

    sessions.set(sessionId, { transport, server });
    server.onclose = () => {
      sessions.delete(sessionId);
      console.error(`[mcp] SSE session ${sessionId} closed`);
    };

    await server.connect(transport);
    console.error(`[mcp] SSE session ${sessionId} opened`);
    return RESPONSE_ALREADY_SENT;
  });

  app.post('/messages', async (c) => {
    const sessionId = c.req.query('sessionId');
    if (!sessionId) {
      return c.json({ error: { message: 'Missing sessionId query parameter' } }, 400);
    }

    const session = sessions.get(sessionId);
    if (!session) {
      return c.json({ error: { message: `Unknown session: ${sessionId}` } }, 404);
    }

    await session.transport.handlePostMessage(c.env.incoming, c.env.outgoing);
    return RESPONSE_ALREADY_SENT;
  });

  return { app, sessions };
}

export function startSseServer(gateway: Gateway, options: SseOptions) {
  const { app } = createSseApp(gateway);
  const server = serve({ fetch: app.fetch, hostname: options.host, port: options.port }, (info) => {
    console.error(`[mcp] SpaceTraders MCP server listening on http://${options.host}:${info.port}/sse`);
  });
  return server;
}
