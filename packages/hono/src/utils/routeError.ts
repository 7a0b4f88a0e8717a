import { type EducationConfig, formatError } from '@edu-sessions/core';
import type { Context } from 'hono';
import { ZodError } from 'zod';

/**
 * Maps an error thrown inside a route handler to a JSON error response.
 * Request validation failures map to 400; anything else is logged and hidden (500).
 */
export function routeErrorResponse(
  c: Context,
  config: EducationConfig,
  error: unknown,
  message: string,
): Response {
  if (error instanceof ZodError) {
    return c.json(
      {
        error: 'Invalid request',
        issues: error.issues.map((issue) => ({
          path: issue.path.join('.'),
          message: issue.message,
        })),
      },
      400,
    );
  }
  if (error instanceof SyntaxError) {
    return c.json({ error: 'Invalid JSON body' }, 400);
  }

  config.logger?.error({ error: formatError(error), path: c.req.path }, message);
  return c.json({ error: 'Internal server error' }, 500);
}

/**
 * Reads a JSON request body, treating an empty body as `{}`.
 */
export async function readJsonBody(c: Context): Promise<unknown> {
  const text = await c.req.text();
  if (text.trim() === '') {
    return {};
  }
  const body: unknown = JSON.parse(text);
  return body;
}
