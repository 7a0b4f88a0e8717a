import { type EducationConfig, suggestionView } from '@edu-sessions/core';
import { type Handler } from 'hono';

import { getEducationOrchestrator } from '../../educationOrchestrator.js';
import type { ProcessContextVariables } from '../../processProtection/index.js';
import { SuggestNextStepRequestSchema } from '../../schemas/processRequest.schema.js';
import { readJsonBody, routeErrorResponse } from '../../utils/routeError.js';

/**
 * Creates a route handler recommending the next step of a process.
 * Body: optional `score` in [0, 1] and `apply` to insert the suggestion.
 * @param config - The education config
 * @returns Route handler for next-step suggestions
 */
export function suggestNextStepRouteHandler(
  config: EducationConfig,
): Handler<{ Variables: ProcessContextVariables }> {
  return async (c) => {
    try {
      const body = SuggestNextStepRequestSchema.parse(await readJsonBody(c));

      const suggestion = await getEducationOrchestrator(config).suggestNextStep(
        c.get('processId'),
        body,
      );
      if (!suggestion) {
        return c.json({ error: 'process_not_found' }, 404);
      }

      return c.json(suggestionView(suggestion));
    } catch (error) {
      return routeErrorResponse(c, config, error, 'Suggest next step endpoint error');
    }
  };
}
