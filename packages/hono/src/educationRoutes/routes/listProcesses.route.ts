import { type EducationConfig, processSummaryView } from '@edu-sessions/core';
import { type Handler } from 'hono';

import { getEducationOrchestrator } from '../../educationOrchestrator.js';
import { ListProcessesQuerySchema } from '../../schemas/processRequest.schema.js';
import { routeErrorResponse } from '../../utils/routeError.js';

/**
 * Creates a route handler listing processes, most recently updated first.
 * Accepts `user_id` and `limit` query parameters.
 * @param config - The education config
 * @returns Route handler for process listing
 */
export function listProcessesRouteHandler(config: EducationConfig): Handler {
  return async (c) => {
    try {
      const query = ListProcessesQuerySchema.parse(c.req.query());

      const orchestrator = getEducationOrchestrator(config);
      const processes = await orchestrator.listProcesses({
        userId: query.user_id,
        limit: query.limit,
      });

      return c.json({ count: processes.length, processes: processes.map(processSummaryView) });
    } catch (error) {
      return routeErrorResponse(c, config, error, 'List processes endpoint error');
    }
  };
}
