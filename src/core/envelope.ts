/**
 * Response Interpretation
 * Success/error discrimination over the remote `{ data, meta }` /
 * `{ error: { message, code } }` envelope
 */

import { z } from 'zod';
import { RemoteError } from './errors.js';
import { RawResponse } from './types.js';

const ErrorEnvelopeSchema = z.object({
  error: z.object({
    message: z.string().optional(),
    code: z.number().optional()
  })
});

export const UNKNOWN_ERROR = 'Unknown error';

export type Interpreted =
  | { kind: 'ok'; status: number; data: unknown; meta?: unknown }
  | { kind: 'empty'; status: 204 }
  | { kind: 'error'; status: number; message: string; code?: number };

export type Failure = Extract<Interpreted, { kind: 'error' }>;

/**
 * 204 is its own outcome (e.g. "no active cooldown"); `expected` lists the
 * statuses that count as success with a body; every other status is a
 * failure carrying the remote message.
 */
export function interpretResponse(
  response: RawResponse,
  expected: number | readonly number[] = 200
): Interpreted {
  const accepted = typeof expected === 'number' ? [expected] : expected;

  if (response.status === 204) {
    return { kind: 'empty', status: 204 };
  }

  if (accepted.includes(response.status)) {
    const body = response.body;
    if (typeof body !== 'object' || body === null || !('data' in body)) {
      return { kind: 'ok', status: response.status, data: body };
    }
    return 'meta' in body
      ? { kind: 'ok', status: response.status, data: body.data, meta: body.meta }
      : { kind: 'ok', status: response.status, data: body.data };
  }

  const envelope = ErrorEnvelopeSchema.safeParse(response.body);
  if (!envelope.success) {
    return { kind: 'error', status: response.status, message: UNKNOWN_ERROR };
  }

  const { message, code } = envelope.data.error;
  return code === undefined
    ? { kind: 'error', status: response.status, message: message ?? UNKNOWN_ERROR }
    : { kind: 'error', status: response.status, message: message ?? UNKNOWN_ERROR, code };
}

/** Like interpretResponse, but failures throw RemoteError */
export function expectData(
  response: RawResponse,
  expected: number | readonly number[] = 200
): Exclude<Interpreted, Failure> {
  const result = interpretResponse(response, expected);
  if (result.kind === 'error') {
    throw new RemoteError(result.status, result.message, result.code);
  }
  return result;
}

export function describeFailure(action: string, failure: Failure): string {
  return `Failed to ${action}: ${failure.message} (Status code: ${failure.status})`;
}
