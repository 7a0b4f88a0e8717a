export { EducationOrchestrator } from './educationOrchestrator.js';

// interfaces
export type {
  ContextRetriever,
  EducationConfig,
  ProgressReporter,
  ProgressUpdate,
} from './interfaces/educationConfig.js';
export {
  DEFAULT_LIST_LIMIT,
  type EducationSession,
  type EducationSessionUpdate,
  type ListSessionsOptions,
  type NewEducationSession,
} from './interfaces/educationSession.js';
export type { EducationSessionStorage } from './interfaces/educationSessionStorage.js';
export type { JsonPrimitive, JsonValue } from './interfaces/json.js';
export type {
  AdvanceResult,
  NextStepSuggestion,
  ProcessInstance,
} from './interfaces/processInstance.js';

// schemas
export * from './schemas/index.js';

// services
export {
  currentStep,
  isComplete,
  StoredProcessError,
  toProcessInstance,
  toSessionUpdate,
} from './services/processInstance.service.js';
export { buildStepResult, scoreAnswer } from './services/stepContent.service.js';
export {
  findLastScore,
  HIGH_SCORE_THRESHOLD,
  LOW_SCORE_THRESHOLD,
  recommendNextStep,
} from './services/suggestion.service.js';
export { DEFAULT_WORKFLOWS, getWorkflow } from './services/workflows.js';

// views
export {
  advanceView,
  type ProcessView,
  processSummaryView,
  processView,
  startedProcessView,
  type StepResultView,
  stepResultView,
  suggestionView,
} from './views/process.view.js';

// utils
export { isServerlessEnvironment } from './utils/environment.js';
export { formatError } from './utils/errorFormatting.js';
export { createSilentLogger } from './utils/logger.js';
