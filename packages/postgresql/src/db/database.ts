import type { PgDatabase, PgQueryResultHKT } from 'drizzle-orm/pg-core';

import type * as schema from './schema/index.js';

/**
 * Any Drizzle PostgreSQL database carrying the education schema
 * (postgres.js in production, PGlite in tests).
 */
export type EducationDatabase = PgDatabase<PgQueryResultHKT, typeof schema>;
