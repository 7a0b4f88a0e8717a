import type { Context, MiddlewareHandler, Next } from 'hono';

import { ProcessIdParamSchema } from '../schemas/processRequest.schema.js';

/**
 * Context variables available when using process id validation middleware.
 */
export interface ProcessContextVariables {
  processId: string;
}

/**
 * Creates middleware that validates the `:id` path parameter of per-process routes.
 * @returns Hono middleware handler that rejects ids that are not UUIDs
 */
export function validateProcessId(): MiddlewareHandler {
  return async (
    c: Context<{ Variables: ProcessContextVariables }>,
    next: Next,
  ): Promise<Response | undefined> => {
    const result = ProcessIdParamSchema.safeParse(c.req.param('id'));
    if (!result.success) {
      return c.json({ error: 'process id must be a UUID' }, 400);
    }

    c.set('processId', result.data);
    await next();
  };
}
