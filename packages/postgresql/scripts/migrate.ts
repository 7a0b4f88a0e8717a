// scripts/migrate.ts
import 'dotenv/config';

import { pino } from 'pino';

import { PostgresStorage } from '../src/index.js';

const logger = pino({ name: 'edu-sessions-migrate' });

const connectionUrl = process.env.DATABASE_URL;
if (!connectionUrl) {
  logger.error('DATABASE_URL is not set');
  process.exit(1);
}

const storage = new PostgresStorage({ connectionUrl, logger });

try {
  const files = await storage.migrate();
  logger.info({ files }, 'education schema is up to date');
} finally {
  await storage.close();
}
