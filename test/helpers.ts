import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { loadConfig } from '../src/core/config.js';
import { createGateway, Gateway } from '../src/core/gateway.js';
import { Clock, HttpTransport, OutgoingRequest, TokenSet } from '../src/core/types.js';

export const BASE_URL = 'https://api.test/v2';
export const ACCOUNT_TOKEN = 'test-account-token';

/** Time only moves when something sleeps */
export class FakeClock implements Clock {
  readonly sleeps: number[] = [];

  constructor(public time = 0) {}

  now(): number {
    return this.time;
  }

  sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.time += ms;
    return Promise.resolve();
  }
}

export interface FakeReply {
  status: number;
  /** Sent as JSON */
  body?: unknown;
  /** Sent as-is instead of `body` */
  text?: string;
}

export function replyWith(reply: FakeReply): Response {
  if (reply.text !== undefined) {
    return new Response(reply.text, { status: reply.status });
  }
  if (reply.body === undefined) {
    return new Response(null, { status: reply.status });
  }
  return new Response(JSON.stringify(reply.body), {
    status: reply.status,
    headers: { 'Content-Type': 'application/json' }
  });
}

/** Answers requests from a queue, recording each one */
export function fakeTransport(replies: Array<FakeReply | Error>) {
  const requests: OutgoingRequest[] = [];
  const transport: HttpTransport = async (request) => {
    requests.push(request);
    const reply = replies.shift();
    if (reply === undefined) {
      throw new Error(`No reply queued for ${request.method} ${request.url}`);
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return replyWith(reply);
  };
  return { transport, requests };
}

export function tempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'spacetraders-gateway-'));
}

export interface TestGatewayOptions {
  tokens?: TokenSet;
  accountToken?: string;
  replies?: Array<FakeReply | Error>;
}

export function makeTestGateway(options: TestGatewayOptions = {}) {
  const dir = tempDir();
  const tokensFile = path.join(dir, 'agent_tokens.json');
  if (options.tokens) {
    fs.writeFileSync(tokensFile, JSON.stringify(options.tokens));
  }

  const config = loadConfig({
    SPACETRADERS_API_KEY: options.accountToken ?? '',
    SPACETRADERS_BASE_URL: BASE_URL,
    SPACETRADERS_TOKENS_FILE: tokensFile,
    SPACETRADERS_TIMEOUT_MS: '0'
  });
  const clock = new FakeClock();
  const { transport, requests } = fakeTransport(options.replies ?? []);
  const gateway: Gateway = createGateway(config, { transport, clock });

  return { gateway, requests, clock, dir, tokensFile };
}
