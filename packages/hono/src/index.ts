export { getEducationOrchestrator } from './educationOrchestrator.js';
export * from './educationRoutes/index.js';
export { type ProcessContextVariables, validateProcessId } from './processProtection/index.js';
export * from './schemas/processRequest.schema.js';
export { readJsonBody, routeErrorResponse } from './utils/routeError.js';
