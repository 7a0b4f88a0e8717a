import type { JsonValue } from './json.js';

/**
 * A persisted education session, one per pedagogical workflow instance.
 * `steps` and `history` are opaque documents to the store; their shape is
 * validated by the orchestrator, never by storage.
 */
export interface EducationSession {
  /** Unique session identifier (UUID), generated by the store if not supplied */
  id: string;

  /** Opaque identifier of the owning user */
  userId: string;

  /** Free-text subject of the session */
  topic: string;

  /** Workflow variant name (e.g. 'guided_practice'); stored as free text */
  processType: string;

  /** Ordered step descriptors */
  steps: JsonValue[];

  /** Zero-based cursor into `steps`; not bounded by the store */
  currentIndex: number;

  /** Ordered record of past step results */
  history: JsonValue[];

  /** Set once at insertion */
  createdAt: Date;

  /** Refreshed by the store on every update, whatever the caller sends */
  updatedAt: Date;
}

/**
 * Fields accepted when creating a session. Everything else is defaulted by the store.
 */
export type NewEducationSession = Pick<EducationSession, 'userId' | 'topic' | 'processType'> &
  Partial<Pick<EducationSession, 'id' | 'steps' | 'currentIndex' | 'history'>>;

/**
 * Mutable fields of a session. `updatedAt` is intentionally absent: the store owns it.
 */
export type EducationSessionUpdate = Partial<
  Pick<EducationSession, 'topic' | 'processType' | 'steps' | 'currentIndex' | 'history'>
>;

export interface ListSessionsOptions {
  /** Only return sessions owned by this user */
  userId?: string;
  /** Maximum number of sessions (defaults to 100) */
  limit?: number;
}

export const DEFAULT_LIST_LIMIT = 100;
