import { randomUUID } from 'node:crypto';

import type {
  EducationSession,
  EducationSessionUpdate,
  ListSessionsOptions,
  NewEducationSession,
} from '../../src/interfaces/educationSession.js';
import type { EducationSessionStorage } from '../../src/interfaces/educationSessionStorage.js';
import type { ProcessInstance } from '../../src/interfaces/processInstance.js';

export const TEST_SESSION_ID = '0b9d6a52-3f7e-4c1a-9d2b-6f1e8a4c7b30';

export const createMockProcessInstance = (
  overrides: Partial<ProcessInstance> = {},
): ProcessInstance => ({
  id: TEST_SESSION_ID,
  userId: 'u1',
  topic: 'fractions',
  processType: 'fundamental_explanation',
  steps: ['explain', 'example', 'exercise', 'evaluate', 'feedback'],
  currentIndex: 0,
  history: [],
  createdAt: new Date('2024-03-01T10:00:00.000Z'),
  updatedAt: new Date('2024-03-01T10:00:00.000Z'),
  ...overrides,
});

/**
 * Map-backed storage for orchestrator tests. Stamps updatedAt on every update.
 */
export class FakeSessionStorage implements EducationSessionStorage {
  readonly sessions = new Map<string, EducationSession>();

  async addSession(session: NewEducationSession): Promise<string> {
    const id = session.id ?? randomUUID();
    const now = new Date();
    this.sessions.set(id, {
      steps: [],
      currentIndex: 0,
      history: [],
      ...session,
      id,
      createdAt: now,
      updatedAt: now,
    });
    return id;
  }

  async getSession(sessionId: string): Promise<EducationSession | undefined> {
    return this.sessions.get(sessionId);
  }

  async listSessions(options: ListSessionsOptions = {}): Promise<EducationSession[]> {
    return [...this.sessions.values()]
      .filter((s) => options.userId === undefined || s.userId === options.userId)
      .sort((a, b) => b.updatedAt.getTime() - a.updatedAt.getTime())
      .slice(0, options.limit ?? 100);
  }

  async updateSession(
    sessionId: string,
    update: EducationSessionUpdate,
  ): Promise<EducationSession | undefined> {
    const existing = this.sessions.get(sessionId);
    if (!existing) return undefined;
    const updated = { ...existing, ...update, updatedAt: new Date() };
    this.sessions.set(sessionId, updated);
    return updated;
  }

  async deleteSession(sessionId: string): Promise<boolean> {
    return this.sessions.delete(sessionId);
  }
}
