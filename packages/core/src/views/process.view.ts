import type {
  AdvanceResult,
  NextStepSuggestion,
  ProcessInstance,
} from '../interfaces/processInstance.js';
import type { StepResult } from '../schemas/process.schema.js';
import { currentStep, isComplete } from '../services/processInstance.service.js';

// JSON bodies (HTTP and MCP tools) use snake_case field names

export function stepResultView(result: StepResult) {
  return {
    step: result.step,
    content: result.content,
    context: result.context,
    created_at: result.createdAt,
  };
}

export function processSummaryView(instance: ProcessInstance) {
  return {
    process_id: instance.id,
    user_id: instance.userId,
    topic: instance.topic,
    process_type: instance.processType,
    current_index: instance.currentIndex,
    completed: isComplete(instance),
  };
}

export function processView(instance: ProcessInstance) {
  return {
    ...processSummaryView(instance),
    steps: instance.steps,
    current_step: currentStep(instance),
    history: instance.history.map(stepResultView),
    created_at: instance.createdAt.toISOString(),
    updated_at: instance.updatedAt.toISOString(),
  };
}

export function startedProcessView(instance: ProcessInstance) {
  return {
    process_id: instance.id,
    process_type: instance.processType,
    steps: instance.steps,
    current_step: currentStep(instance),
  };
}

export function advanceView(outcome: AdvanceResult) {
  if (!outcome.result) {
    return { completed: outcome.completed };
  }
  return { completed: outcome.completed, step_result: stepResultView(outcome.result) };
}

export function suggestionView(suggestion: NextStepSuggestion) {
  return {
    completed: suggestion.completed,
    suggestion: suggestion.suggestion,
    rationale: suggestion.rationale ?? null,
    confidence: suggestion.confidence ?? null,
    applied: suggestion.applied,
  };
}

export type StepResultView = ReturnType<typeof stepResultView>;
export type ProcessView = ReturnType<typeof processView>;
