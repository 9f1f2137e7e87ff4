export * from './core/types.js';
export * from './core/errors.js';
export * from './core/config.js';
export * from './core/credentials.js';
export * from './core/rate-limiter.js';
export * from './core/dispatcher.js';
export * from './core/envelope.js';
export * from './core/registration.js';
export * from './core/gateway.js';
export { createMcpServer, startStdioServer } from './mcp/server.js';
export { createSseApp, startSseServer } from './mcp/http.js';
export { TOOLS, callTool, NO_COOLDOWN } from './mcp/tools.js';
