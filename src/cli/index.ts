#!/usr/bin/env node
/**
 * SpaceTraders Gateway CLI
 * Serves the MCP tools or talks to the API directly
 */

import dotenv from 'dotenv';
import { loadConfig } from '../core/config.js';
import { createGateway, Gateway } from '../core/gateway.js';
import { describeError } from '../core/errors.js';
import { createProgram } from './program.js';

dotenv.config();

let gateway: Gateway | undefined;

function openGateway(): Gateway {
  if (!gateway) {
    gateway = createGateway(loadConfig());
  }
  return gateway;
}

createProgram(openGateway)
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(`Error: ${describeError(error)}`);
    process.exit(1);
  });
