/**
 * Request parsing helpers
 */

import type { Context } from 'hono';
import type { z } from 'zod';

import { parseMoney } from '@/lib/money.js';
import type { Cents } from '@/types/index.js';

import { apiError } from './response.js';

export type Parsed<T> = { ok: true; data: T } | { ok: false; response: Response };

/**
 * Read the JSON body and validate it. An absent body is treated as `{}`
 * so schemas with only optional fields accept empty requests.
 */
export async function parseBody<S extends z.ZodTypeAny>(
  c: Context,
  schema: S,
  requestId: string
): Promise<Parsed<z.infer<S>>> {
  let rawBody: unknown = {};
  const text = await c.req.text();
  if (text.trim() !== '') {
    try {
      rawBody = JSON.parse(text);
    } catch {
      return {
        ok: false,
        response: apiError(c, 'VALIDATION_ERROR', 'Invalid JSON body', requestId),
      };
    }
  }

  const validation = schema.safeParse(rawBody);
  if (!validation.success) {
    const issue = validation.error.issues[0];
    const message =
      issue === undefined
        ? 'Validation error'
        : `${issue.path.join('.') || 'body'}: ${issue.message}`;
    return {
      ok: false,
      response: apiError(c, 'VALIDATION_ERROR', message, requestId),
    };
  }

  return { ok: true, data: validation.data };
}

/**
 * Optimistic concurrency token from `If-Match: <version>` (quotes allowed)
 */
export function parseIfMatch(
  c: Context,
  requestId: string
): Parsed<number | undefined> {
  const header = c.req.header('If-Match');
  if (header === undefined) {
    return { ok: true, data: undefined };
  }
  const version = Number(header.replace(/^W\//, '').replace(/"/g, '').trim());
  if (!Number.isSafeInteger(version) || version < 1) {
    return {
      ok: false,
      response: apiError(
        c,
        'VALIDATION_ERROR',
        'If-Match must carry an entity version',
        requestId
      ),
    };
  }
  return { ok: true, data: version };
}

/**
 * Decimal string amount, e.g. "10.50"
 */
export function moneyField(schema: z.ZodString) {
  return schema.transform((value, ctx): Cents => {
    const cents = parseMoney(value);
    if (cents === null || cents < 0) {
      ctx.addIssue({
        code: 'custom',
        message: 'must be a non-negative decimal amount with at most 2 places',
      });
      return 0;
    }
    return cents;
  });
}
