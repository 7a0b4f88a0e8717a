import { type EducationConfig } from '@edu-sessions/core';
import { type Handler } from 'hono';

import { getEducationOrchestrator } from '../../educationOrchestrator.js';
import type { ProcessContextVariables } from '../../processProtection/index.js';
import { routeErrorResponse } from '../../utils/routeError.js';

/**
 * Creates a route handler deleting a process and its history.
 * @param config - The education config
 * @returns Route handler responding 204 on success
 */
export function deleteProcessRouteHandler(
  config: EducationConfig,
): Handler<{ Variables: ProcessContextVariables }> {
  return async (c) => {
    try {
      const deleted = await getEducationOrchestrator(config).deleteProcess(c.get('processId'));
      if (!deleted) {
        return c.json({ error: 'process_not_found' }, 404);
      }
      return c.body(null, 204);
    } catch (error) {
      return routeErrorResponse(c, config, error, 'Delete process endpoint error');
    }
  };
}
