import type { Logger } from 'pino';

import type { StepType } from '../schemas/process.schema.js';
import type { EducationSessionStorage } from './educationSessionStorage.js';
import type { JsonValue } from './json.js';

/**
 * Supplies supporting material (citations) for a step.
 */
export interface ContextRetriever {
  /**
   * @param query - Free-text query built from the topic and step
   * @param matchCount - Maximum number of chunks to return
   */
  searchDocuments(query: string, matchCount: number): Promise<JsonValue[]>;
}

export interface ProgressUpdate {
  status: 'in_progress' | 'completed';
  step: StepType;
  /** Share of steps completed, 0-100 */
  percentage: number;
  log: string;
}

/**
 * Receives progress events for long-running education processes (e.g. a socket broadcaster).
 */
export interface ProgressReporter {
  startOperation(
    operationId: string,
    operationType: string,
    metadata: Record<string, JsonValue>,
  ): Promise<void>;
  updateProgress(operationId: string, update: ProgressUpdate): Promise<void>;
  completeOperation(operationId: string, result: Record<string, JsonValue>): Promise<void>;
}

/**
 * Configuration object for initializing an EducationOrchestrator.
 */
export interface EducationConfig {
  /** Storage adapter for persisting sessions */
  storage: EducationSessionStorage;

  /** Optional pino logger */
  logger?: Logger;

  /** Optional document retriever; steps carry no citations without it */
  retriever?: ContextRetriever;

  /** Optional progress sink */
  progress?: ProgressReporter;

  /** Number of citations requested per step (defaults to 5) */
  citationCount?: number;
}
