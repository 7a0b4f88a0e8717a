import type { ProcessType, StepResult, StepType } from '../schemas/process.schema.js';
import type { EducationSession } from './educationSession.js';

/**
 * An education session with its workflow state parsed into typed steps and results.
 */
export interface ProcessInstance
  extends Omit<EducationSession, 'processType' | 'steps' | 'history'> {
  processType: ProcessType;
  steps: StepType[];
  history: StepResult[];
}

/** Outcome of advancing a process by one step. */
export interface AdvanceResult {
  /** True once every step has been run */
  completed: boolean;
  /** Result of the step just run; absent when the process was already complete */
  result?: StepResult;
  instance: ProcessInstance;
}

/** Recommended next step, optionally applied to the workflow. */
export interface NextStepSuggestion {
  completed: boolean;
  suggestion: StepType | null;
  rationale?: string;
  confidence?: number;
  /** True if the suggestion was inserted at the current position and saved */
  applied: boolean;
}
