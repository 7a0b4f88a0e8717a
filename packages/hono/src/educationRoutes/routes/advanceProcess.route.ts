import { type EducationConfig, advanceView } from '@edu-sessions/core';
import { type Handler } from 'hono';

import { getEducationOrchestrator } from '../../educationOrchestrator.js';
import type { ProcessContextVariables } from '../../processProtection/index.js';
import { AdvanceRequestSchema } from '../../schemas/processRequest.schema.js';
import { readJsonBody, routeErrorResponse } from '../../utils/routeError.js';

/**
 * Creates a route handler that runs the current step of a process.
 * The optional `user_input` body field is the learner's answer.
 * @param config - The education config
 * @returns Route handler for advancing a process
 */
export function advanceProcessRouteHandler(
  config: EducationConfig,
): Handler<{ Variables: ProcessContextVariables }> {
  return async (c) => {
    try {
      const body = AdvanceRequestSchema.parse(await readJsonBody(c));

      const outcome = await getEducationOrchestrator(config).advance(
        c.get('processId'),
        body.user_input,
      );
      if (!outcome) {
        return c.json({ error: 'process_not_found' }, 404);
      }

      return c.json(advanceView(outcome));
    } catch (error) {
      return routeErrorResponse(c, config, error, 'Advance process endpoint error');
    }
  };
}
