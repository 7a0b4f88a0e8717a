export { JsonValueSchema, SessionIdSchema } from './common.schema.js';
export {
  EducationSessionUpdateSchema,
  NewEducationSessionSchema,
} from './educationSession.schema.js';
export {
  ListProcessesSchema,
  ProcessStateSchema,
  ProcessTypeSchema,
  StartProcessSchema,
  StepTypeSchema,
  StoredStepResultSchema,
  SuggestNextStepSchema,
  type ListProcessesParams,
  type ProcessType,
  type StartProcessParams,
  type StepResult,
  type StepType,
  type SuggestNextStepParams,
} from './process.schema.js';
