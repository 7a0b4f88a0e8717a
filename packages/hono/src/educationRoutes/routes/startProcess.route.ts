import { type EducationConfig, startedProcessView } from '@edu-sessions/core';
import { type Handler } from 'hono';

import { getEducationOrchestrator } from '../../educationOrchestrator.js';
import { StartProcessRequestSchema } from '../../schemas/processRequest.schema.js';
import { readJsonBody, routeErrorResponse } from '../../utils/routeError.js';

/**
 * Creates a route handler that starts a new education process.
 * @param config - The education config
 * @returns Route handler responding 201 with the new process
 */
export function startProcessRouteHandler(config: EducationConfig): Handler {
  return async (c) => {
    try {
      const body = StartProcessRequestSchema.parse(await readJsonBody(c));

      const orchestrator = getEducationOrchestrator(config);
      const instance = await orchestrator.startProcess({
        userId: body.user_id,
        topic: body.topic,
        processType: body.process_type,
      });

      return c.json(startedProcessView(instance), 201);
    } catch (error) {
      return routeErrorResponse(c, config, error, 'Start process endpoint error');
    }
  };
}
