import type { Logger } from 'pino';

import type {
  EducationConfig,
  ProgressReporter,
  ProgressUpdate,
} from './interfaces/educationConfig.js';
import type { EducationSession } from './interfaces/educationSession.js';
import type { JsonValue } from './interfaces/json.js';
import type {
  AdvanceResult,
  NextStepSuggestion,
  ProcessInstance,
} from './interfaces/processInstance.js';
import {
  ListProcessesSchema,
  type ListProcessesParams,
  SessionIdSchema,
  StartProcessSchema,
  type StartProcessParams,
  type StepType,
  SuggestNextStepSchema,
  type SuggestNextStepParams,
} from './schemas/index.js';
import {
  currentStep,
  isComplete,
  StoredProcessError,
  toProcessInstance,
  toSessionUpdate,
} from './services/processInstance.service.js';
import { buildStepResult } from './services/stepContent.service.js';
import { recommendNextStep } from './services/suggestion.service.js';
import { getWorkflow } from './services/workflows.js';
import { formatError } from './utils/errorFormatting.js';
import { createSilentLogger } from './utils/logger.js';

const OPERATION_TYPE = 'education_process';
const DEFAULT_CITATION_COUNT = 5;

/**
 * Runs pedagogical workflows on top of an education session store.
 * Retrieval and progress reporting are optional collaborators; their failures
 * are logged and never fail a step.
 *
 * @example
 * ```typescript
 * const orchestrator = new EducationOrchestrator({
 *   storage: new MemoryStorage(),
 *   logger: pino(),
 * });
 *
 * const process = await orchestrator.startProcess({
 *   userId: 'learner-1',
 *   topic: 'fractions',
 *   processType: 'guided_practice',
 * });
 * const outcome = await orchestrator.advance(process.id, 'three quarters');
 * ```
 */
export class EducationOrchestrator {
  private logger: Logger;

  constructor(private config: EducationConfig) {
    this.logger = config.logger ?? createSilentLogger();
  }

  /**
   * Creates a session for the workflow of the given process type.
   *
   * @param params - User, topic and process type (defaults to fundamental explanation)
   * @returns The persisted process instance
   */
  async startProcess(params: StartProcessParams): Promise<ProcessInstance> {
    const { userId, topic, processType } = StartProcessSchema.parse(params);
    const steps = getWorkflow(processType);
    this.logger.info({ userId, topic, processType }, 'starting education process');

    const sessionId = await this.config.storage.addSession({
      userId,
      topic,
      processType,
      steps,
    });

    const instance = await this.getProcess(sessionId);
    if (!instance) {
      throw new Error(`Session ${sessionId} not found after creation`);
    }

    await this.reportProgress(instance.id, (progress) =>
      progress.startOperation(instance.id, OPERATION_TYPE, { topic, step: steps[0] }),
    );

    this.logger.debug({ sessionId, steps }, 'education process started');
    return instance;
  }

  /**
   * A stored session whose workflow state cannot be read is reported as not found.
   *
   * @param sessionId - Unique session identifier
   * @returns Process instance if found, undefined otherwise
   */
  async getProcess(sessionId: string): Promise<ProcessInstance | undefined> {
    this.logger.debug({ sessionId }, 'getting education process');
    const session = await this.config.storage.getSession(SessionIdSchema.parse(sessionId));
    if (!session) {
      this.logger.warn({ sessionId }, 'education process not found');
      return undefined;
    }
    return this.readProcess(session);
  }

  /**
   * Lists processes, most recently updated first.
   * Stored sessions whose workflow state cannot be read are left out.
   */
  async listProcesses(params: ListProcessesParams = {}): Promise<ProcessInstance[]> {
    const options = ListProcessesSchema.parse(params);
    const sessions = await this.config.storage.listSessions(options);
    this.logger.debug({ ...options, count: sessions.length }, 'education processes found');
    return sessions.flatMap((session) => this.readProcess(session) ?? []);
  }

  /**
   * Runs the current step, appends its result to the history and moves the cursor.
   *
   * @param sessionId - Unique session identifier
   * @param userInput - Learner answer for the current step
   * @returns The step outcome, or undefined if the process does not exist
   */
  async advance(
    sessionId: string,
    userInput?: string | null,
  ): Promise<AdvanceResult | undefined> {
    const instance = await this.getProcess(sessionId);
    if (!instance) return undefined;

    const step = currentStep(instance);
    if (step === null) {
      this.logger.debug({ sessionId }, 'education process already complete');
      return { completed: true, instance };
    }

    const citations = await this.retrieveCitations(instance.topic, step);
    const result = buildStepResult({ step, topic: instance.topic, userInput, citations });

    const next: ProcessInstance = {
      ...instance,
      currentIndex: instance.currentIndex + 1,
      history: [...instance.history, result],
    };
    const saved = await this.save(next);
    const completed = isComplete(saved);

    const update: ProgressUpdate = {
      status: completed ? 'completed' : 'in_progress',
      step,
      percentage: Math.floor((100 * saved.currentIndex) / Math.max(saved.steps.length, 1)),
      log: `Step ${step} completed`,
    };
    await this.reportProgress(sessionId, async (progress) => {
      await progress.updateProgress(sessionId, update);
      if (completed) {
        await progress.completeOperation(sessionId, { result: 'ok' });
      }
    });

    this.logger.info(
      { sessionId, step, currentIndex: saved.currentIndex, completed },
      'education process advanced',
    );
    return { completed, result, instance: saved };
  }

  /**
   * Recommends the next step from the learner's latest score and optionally
   * inserts it at the current position of the workflow.
   *
   * @param sessionId - Unique session identifier
   * @param params - Explicit score and whether to apply the suggestion
   * @returns The suggestion, or undefined if the process does not exist
   */
  async suggestNextStep(
    sessionId: string,
    params: SuggestNextStepParams = {},
  ): Promise<NextStepSuggestion | undefined> {
    const { score, apply } = SuggestNextStepSchema.parse(params);
    const instance = await this.getProcess(sessionId);
    if (!instance) return undefined;

    if (isComplete(instance)) {
      return { completed: true, suggestion: null, applied: false };
    }

    const recommendation = recommendNextStep(instance, score);

    let applied = false;
    if (apply && recommendation.suggestion !== null) {
      await this.save({
        ...instance,
        steps: insertStep(instance.steps, instance.currentIndex, recommendation.suggestion),
      });
      applied = true;
      this.logger.info(
        { sessionId, suggestion: recommendation.suggestion },
        'suggested step applied',
      );
    }

    return { completed: false, ...recommendation, applied };
  }

  /**
   * Deletes a process and its history.
   *
   * @returns true if the process existed
   */
  async deleteProcess(sessionId: string): Promise<boolean> {
    this.logger.info({ sessionId }, 'deleting education process');
    return this.config.storage.deleteSession(SessionIdSchema.parse(sessionId));
  }

  private readProcess(session: EducationSession): ProcessInstance | undefined {
    try {
      return toProcessInstance(session);
    } catch (error) {
      if (!(error instanceof StoredProcessError)) throw error;
      this.logger.warn(
        { sessionId: session.id, issues: error.issues },
        'stored education process is unreadable',
      );
      return undefined;
    }
  }

  private async save(instance: ProcessInstance): Promise<ProcessInstance> {
    const updated = await this.config.storage.updateSession(
      instance.id,
      toSessionUpdate(instance),
    );
    if (!updated) {
      throw new Error(`Session ${instance.id} disappeared during update`);
    }
    return toProcessInstance(updated);
  }

  private async retrieveCitations(topic: string, step: StepType): Promise<JsonValue[]> {
    const { retriever } = this.config;
    if (!retriever) return [];

    const query = `${topic} - step: ${step}`;
    try {
      return await retriever.searchDocuments(
        query,
        this.config.citationCount ?? DEFAULT_CITATION_COUNT,
      );
    } catch (error) {
      this.logger.warn({ query, error: formatError(error) }, 'context retrieval failed');
      return [];
    }
  }

  private async reportProgress(
    sessionId: string,
    report: (progress: ProgressReporter) => Promise<void>,
  ): Promise<void> {
    const { progress } = this.config;
    if (!progress) return;

    try {
      await report(progress);
    } catch (error) {
      this.logger.warn({ sessionId, error: formatError(error) }, 'progress report failed');
    }
  }
}

function insertStep(steps: readonly StepType[], index: number, step: StepType): StepType[] {
  return [...steps.slice(0, index), step, ...steps.slice(index)];
}
