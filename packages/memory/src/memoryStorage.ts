import { randomUUID } from 'node:crypto';

import {
  createSilentLogger,
  DEFAULT_LIST_LIMIT,
  type EducationSession,
  type EducationSessionStorage,
  type EducationSessionUpdate,
  EducationSessionUpdateSchema,
  type ListSessionsOptions,
  type NewEducationSession,
  NewEducationSessionSchema,
} from '@edu-sessions/core';
import type { Logger } from 'pino';

import type { MemoryStorageConfig } from './interfaces/memoryStorageConfig.js';

/**
 * In-memory education session storage.
 *
 * ⚠️  **WARNING: NOT SUITABLE FOR SERVERLESS/MULTI-INSTANCE DEPLOYMENTS**
 *
 * Sessions live in process memory and are lost on restart. It's intended for:
 * - Development and testing
 * - Single-instance server deployments
 * - Reference implementation
 *
 * Mirrors the PostgreSQL table: inputs are checked against the same column
 * constraints and `updatedAt` is stamped on every update, whatever the caller sends.
 */
export class MemoryStorage implements EducationSessionStorage {
  private sessions = new Map<string, EducationSession>();

  // lookup index (for listing by user)
  private sessionsByUser = new Map<string, Set<string>>(); // userId -> sessionIds

  private logger: Logger;
  private now: () => Date;

  constructor(config?: MemoryStorageConfig) {
    this.logger = config?.logger ?? createSilentLogger();
    this.now = config?.now ?? (() => new Date());
  }

  // oxlint-disable-next-line require-await
  async addSession(session: NewEducationSession): Promise<string> {
    const parsed = NewEducationSessionSchema.parse(session);
    const id = parsed.id ?? randomUUID();

    if (this.sessions.has(id)) {
      throw new Error(`Session ${id} already exists`);
    }

    const timestamp = this.now();
    this.logger.info(
      { sessionId: id, userId: parsed.userId, processType: parsed.processType },
      'adding session',
    );

    this.sessions.set(id, {
      ...parsed,
      id,
      createdAt: timestamp,
      updatedAt: timestamp,
    });

    const userSessions = this.sessionsByUser.get(parsed.userId) ?? new Set<string>();
    userSessions.add(id);
    this.sessionsByUser.set(parsed.userId, userSessions);

    return id;
  }

  // oxlint-disable-next-line require-await
  async getSession(sessionId: string): Promise<EducationSession | undefined> {
    const session = this.sessions.get(sessionId);
    if (!session) {
      this.logger.warn({ sessionId }, 'session not found');
      return undefined;
    }
    return structuredClone(session);
  }

  // oxlint-disable-next-line require-await
  async listSessions(options: ListSessionsOptions = {}): Promise<EducationSession[]> {
    const limit = options.limit ?? DEFAULT_LIST_LIMIT;

    let candidates: EducationSession[];
    if (options.userId === undefined) {
      candidates = [...this.sessions.values()];
    } else {
      const ids = this.sessionsByUser.get(options.userId) ?? new Set<string>();
      candidates = [...ids].flatMap((id) => this.sessions.get(id) ?? []);
    }

    return candidates
      .sort(
        (a, b) => b.updatedAt.getTime() - a.updatedAt.getTime() || b.id.localeCompare(a.id),
      )
      .slice(0, limit)
      .map((session) => structuredClone(session));
  }

  // oxlint-disable-next-line require-await
  async updateSession(
    sessionId: string,
    update: EducationSessionUpdate,
  ): Promise<EducationSession | undefined> {
    const existing = this.sessions.get(sessionId);
    if (!existing) {
      this.logger.warn({ sessionId }, 'session not found for update');
      return undefined;
    }

    const changes = EducationSessionUpdateSchema.parse(update);
    this.logger.info({ sessionId, fields: Object.keys(changes) }, 'updating session');

    // never moves backwards, even if the clock does
    const now = this.now();
    const updatedAt = now > existing.updatedAt ? now : new Date(existing.updatedAt);

    const updated: EducationSession = {
      ...existing,
      topic: changes.topic ?? existing.topic,
      processType: changes.processType ?? existing.processType,
      steps: changes.steps ?? existing.steps,
      currentIndex: changes.currentIndex ?? existing.currentIndex,
      history: changes.history ?? existing.history,
      updatedAt,
    };
    this.sessions.set(sessionId, updated);

    return structuredClone(updated);
  }

  // oxlint-disable-next-line require-await
  async deleteSession(sessionId: string): Promise<boolean> {
    const session = this.sessions.get(sessionId);
    if (!session) {
      this.logger.warn({ sessionId }, 'session not found for deletion');
      return false;
    }

    this.logger.info({ sessionId }, 'deleting session');
    this.sessions.delete(sessionId);

    const userSessions = this.sessionsByUser.get(session.userId);
    userSessions?.delete(sessionId);
    if (userSessions?.size === 0) {
      this.sessionsByUser.delete(session.userId);
    }

    return true;
  }
}
