export { educationSessionsTable } from './educationSessions.schema.js';
