import { type EducationConfig, processView } from '@edu-sessions/core';
import { type Handler } from 'hono';

import { getEducationOrchestrator } from '../../educationOrchestrator.js';
import type { ProcessContextVariables } from '../../processProtection/index.js';
import { routeErrorResponse } from '../../utils/routeError.js';

/**
 * Creates a route handler returning a process with its steps and history.
 * Expects `validateProcessId()` to run first.
 * @param config - The education config
 * @returns Route handler for process lookup
 */
export function getProcessRouteHandler(
  config: EducationConfig,
): Handler<{ Variables: ProcessContextVariables }> {
  return async (c) => {
    try {
      const instance = await getEducationOrchestrator(config).getProcess(c.get('processId'));
      if (!instance) {
        return c.json({ error: 'process_not_found' }, 404);
      }
      return c.json(processView(instance));
    } catch (error) {
      return routeErrorResponse(c, config, error, 'Get process endpoint error');
    }
  };
}
