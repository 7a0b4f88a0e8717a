import { type EducationConfig } from '@edu-sessions/core';
import { Hono } from 'hono';

import { type ProcessContextVariables, validateProcessId } from '../processProtection/index.js';
import { advanceProcessRouteHandler } from './routes/advanceProcess.route.js';
import { deleteProcessRouteHandler } from './routes/deleteProcess.route.js';
import { getProcessRouteHandler } from './routes/getProcess.route.js';
import { listProcessesRouteHandler } from './routes/listProcesses.route.js';
import { startProcessRouteHandler } from './routes/startProcess.route.js';
import { suggestNextStepRouteHandler } from './routes/suggestNextStep.route.js';

// route exports
export { advanceProcessRouteHandler } from './routes/advanceProcess.route.js';
export { deleteProcessRouteHandler } from './routes/deleteProcess.route.js';
export { getProcessRouteHandler } from './routes/getProcess.route.js';
export { listProcessesRouteHandler } from './routes/listProcesses.route.js';
export { startProcessRouteHandler } from './routes/startProcess.route.js';
export { suggestNextStepRouteHandler } from './routes/suggestNextStep.route.js';

/**
 * Creates a router with every education process route.
 *
 * @example
 * ```typescript
 * const app = new Hono();
 * app.route('/api/education', educationRoutes({ storage: new MemoryStorage() }));
 * ```
 */
export function educationRoutes(config: EducationConfig) {
  return new Hono<{ Variables: ProcessContextVariables }>()
    .post('/processes', startProcessRouteHandler(config))
    .get('/processes', listProcessesRouteHandler(config))
    .get('/processes/:id', validateProcessId(), getProcessRouteHandler(config))
    .post('/processes/:id/advance', validateProcessId(), advanceProcessRouteHandler(config))
    .post(
      '/processes/:id/suggest-next-step',
      validateProcessId(),
      suggestNextStepRouteHandler(config),
    )
    .delete('/processes/:id', validateProcessId(), deleteProcessRouteHandler(config));
}
