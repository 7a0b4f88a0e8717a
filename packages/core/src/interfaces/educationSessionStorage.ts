import type {
  EducationSession,
  EducationSessionUpdate,
  ListSessionsOptions,
  NewEducationSession,
} from './educationSession.js';

/**
 * Storage interface for persisting education sessions.
 * Implement this interface to use different storage backends (memory, PostgreSQL, etc.).
 *
 * Every implementation must refresh `updatedAt` itself on each update, so the
 * timestamp holds regardless of which client performed the write.
 */
export interface EducationSessionStorage {
  /**
   * Creates a new session. Missing `steps`/`history` default to empty arrays and
   * `currentIndex` to 0.
   *
   * @param session - Required user, topic and process type, plus optional overrides
   * @returns The session ID (generated unless supplied)
   */
  addSession(session: NewEducationSession): Promise<string>;

  /**
   * Retrieves a session by its ID.
   *
   * @param sessionId - Unique session identifier
   * @returns Session if found, undefined otherwise
   */
  getSession(sessionId: string): Promise<EducationSession | undefined>;

  /**
   * Lists sessions, most recently updated first.
   *
   * @param options - Optional user filter and limit
   */
  listSessions(options?: ListSessionsOptions): Promise<EducationSession[]>;

  /**
   * Applies a partial update. `updatedAt` is always refreshed, even for an empty patch.
   *
   * @param sessionId - Unique session identifier
   * @param update - Fields to change
   * @returns The updated session, or undefined if no session matched
   */
  updateSession(
    sessionId: string,
    update: EducationSessionUpdate,
  ): Promise<EducationSession | undefined>;

  /**
   * Removes a session. Nothing cascades.
   *
   * @param sessionId - Unique session identifier
   * @returns true if a session was deleted
   */
  deleteSession(sessionId: string): Promise<boolean>;
}
