import {
  createSilentLogger,
  DEFAULT_LIST_LIMIT,
  type EducationSession,
  type EducationSessionStorage,
  type EducationSessionUpdate,
  isServerlessEnvironment,
  type ListSessionsOptions,
  type NewEducationSession,
} from '@edu-sessions/core';
import { desc, eq, sql } from 'drizzle-orm';
import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import type { Logger } from 'pino';

import type { EducationDatabase } from './db/database.js';
import { applyMigrations } from './db/migrate.js';
import * as schema from './db/schema/index.js';
import type { PostgresStorageConfig } from './interfaces/postgresStorageConfig.js';

const { educationSessionsTable } = schema;

/**
 * PostgreSQL implementation of the education session storage interface.
 *
 * Uses Drizzle ORM for type-safe database operations. `updated_at` is never
 * written from here: the `trg_education_sessions_updated_at` trigger installed
 * by {@link PostgresStorage.migrate} stamps it on every update.
 */
export class PostgresStorage implements EducationSessionStorage {
  private logger: Logger;
  private db: EducationDatabase;
  private client?: postgres.Sql;

  constructor(config: PostgresStorageConfig) {
    this.logger = config.logger ?? createSilentLogger();

    if (config.database) {
      this.db = config.database;
      this.logger.debug('using provided drizzle database');
    } else if (config.connectionUrl) {
      // Smart connection limit defaults
      const isServerless = isServerlessEnvironment();
      const max = config.poolOptions?.max ?? (isServerless ? 1 : 10);
      const idleTimeout = config.poolOptions?.idleTimeout ?? 20;

      // Warn if high connection limit in serverless
      if (isServerless && max > 5) {
        this.logger.warn(
          { max, environment: 'serverless' },
          'High max connections detected in serverless environment. Consider using 1 connection per container to avoid wasting resources.',
        );
      }

      this.client = postgres(config.connectionUrl, { max, idle_timeout: idleTimeout });
      this.db = drizzle(this.client, { schema });

      this.logger.debug(
        { max, idleTimeout, isServerless },
        'PostgreSQL connection pool initialized',
      );
    } else {
      throw new Error('PostgresStorage requires a connectionUrl or a database');
    }
  }

  /**
   * Creates the education_sessions table, its indexes and the updated_at trigger.
   * Safe to call on every startup.
   */
  async migrate(): Promise<string[]> {
    return applyMigrations(this.db, { logger: this.logger });
  }

  async addSession(session: NewEducationSession): Promise<string> {
    this.logger.info(
      { userId: session.userId, topic: session.topic, processType: session.processType },
      'adding session',
    );

    const [inserted] = await this.db
      .insert(educationSessionsTable)
      .values(session)
      .returning({ id: educationSessionsTable.id });

    if (!inserted) {
      throw new Error('Session insert returned no row');
    }

    this.logger.debug({ sessionId: inserted.id }, 'session added');
    return inserted.id;
  }

  async getSession(sessionId: string): Promise<EducationSession | undefined> {
    this.logger.debug({ sessionId }, 'getting session');

    const [session] = await this.db
      .select()
      .from(educationSessionsTable)
      .where(eq(educationSessionsTable.id, sessionId))
      .limit(1);

    if (!session) {
      this.logger.warn({ sessionId }, 'session not found');
      return undefined;
    }

    return session;
  }

  async listSessions(options: ListSessionsOptions = {}): Promise<EducationSession[]> {
    const limit = options.limit ?? DEFAULT_LIST_LIMIT;
    this.logger.debug({ userId: options.userId, limit }, 'listing sessions');

    // served by idx_education_sessions_user / idx_education_sessions_updated
    const sessions = await this.db
      .select()
      .from(educationSessionsTable)
      .where(options.userId ? eq(educationSessionsTable.userId, options.userId) : undefined)
      .orderBy(desc(educationSessionsTable.updatedAt), desc(educationSessionsTable.id))
      .limit(limit);

    this.logger.debug({ count: sessions.length }, 'sessions found');
    return sessions;
  }

  async updateSession(
    sessionId: string,
    update: EducationSessionUpdate,
  ): Promise<EducationSession | undefined> {
    this.logger.info({ sessionId, fields: Object.keys(update) }, 'updating session');

    const hasChanges = Object.values(update).some((value) => value !== undefined);

    // An empty patch still counts as an update: rewrite the cursor so the trigger fires
    const [session] = await this.db
      .update(educationSessionsTable)
      .set(hasChanges ? update : { currentIndex: sql`${educationSessionsTable.currentIndex}` })
      .where(eq(educationSessionsTable.id, sessionId))
      .returning();

    if (!session) {
      this.logger.warn({ sessionId }, 'session not found for update');
      return undefined;
    }

    this.logger.debug({ sessionId, updatedAt: session.updatedAt }, 'session updated');
    return session;
  }

  async deleteSession(sessionId: string): Promise<boolean> {
    this.logger.info({ sessionId }, 'deleting session');

    const deleted = await this.db
      .delete(educationSessionsTable)
      .where(eq(educationSessionsTable.id, sessionId))
      .returning({ id: educationSessionsTable.id });

    if (deleted.length === 0) {
      this.logger.warn({ sessionId }, 'session not found for deletion');
      return false;
    }

    this.logger.debug({ sessionId }, 'session deleted');
    return true;
  }

  /**
   * Close the PostgreSQL connection pool.
   * Should be called on graceful server shutdown or after tests.
   * Not required for serverless environments (Lambda manages lifecycle).
   * A database passed in through the config is left open.
   */
  async close(): Promise<void> {
    if (!this.client) return;

    this.logger.debug('closing PostgreSQL connection pool');
    await this.client.end();
    this.logger.debug('PostgreSQL connection pool closed');
  }
}
