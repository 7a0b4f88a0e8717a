import type { EducationSession, EducationSessionUpdate } from '../interfaces/educationSession.js';
import type { ProcessInstance } from '../interfaces/processInstance.js';
import { ProcessStateSchema, type StepType } from '../schemas/process.schema.js';

/**
 * A stored session whose workflow state the orchestrator cannot read
 * (unknown process type, unknown step name, malformed history entry).
 * Bad stored data, not a bad request.
 */
export class StoredProcessError extends Error {
  constructor(
    readonly sessionId: string,
    readonly issues: string[],
  ) {
    super(`Stored session ${sessionId} has an unreadable workflow state: ${issues.join('; ')}`);
    this.name = 'StoredProcessError';
  }
}

/**
 * Parses a stored session into a typed process instance.
 * @throws StoredProcessError when the stored workflow state is not one the orchestrator understands
 */
export function toProcessInstance(session: EducationSession): ProcessInstance {
  const result = ProcessStateSchema.safeParse(session);
  if (!result.success) {
    throw new StoredProcessError(
      session.id,
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }
  return { ...session, ...result.data };
}

/**
 * Serializes the mutable workflow state of an instance for storage.
 * History entries keep the snake_case `created_at` key of the stored document.
 */
export function toSessionUpdate(instance: ProcessInstance): EducationSessionUpdate {
  return {
    steps: [...instance.steps],
    currentIndex: instance.currentIndex,
    history: instance.history.map((result) => ({
      step: result.step,
      content: result.content,
      context: result.context,
      created_at: result.createdAt,
    })),
  };
}

/**
 * @returns The step at the cursor, or null when the cursor is outside the steps
 */
export function currentStep(instance: ProcessInstance): StepType | null {
  return instance.steps[instance.currentIndex] ?? null;
}

/**
 * A process is complete once there is no step at its cursor. The store does not
 * bound the cursor, so a negative one also counts as complete.
 */
export function isComplete(instance: ProcessInstance): boolean {
  return currentStep(instance) === null;
}
