export { registerEducationTools } from './educationTools.js';
export { createEducationMcpServer } from './educationMcpServer.js';
