import {
  type ProcessType,
  ProcessTypeSchema,
  type StepType,
} from '../schemas/process.schema.js';

/**
 * Default step sequence of each pedagogical workflow.
 */
export const DEFAULT_WORKFLOWS: Readonly<Record<ProcessType, readonly StepType[]>> = {
  fundamental_explanation: ['explain', 'example', 'exercise', 'evaluate', 'feedback'],
  guided_practice: ['example', 'exercise', 'feedback'],
  assessment: ['exercise', 'evaluate', 'feedback'],
};

/**
 * Returns a fresh copy of the steps for a workflow.
 * Unknown process types fall back to the fundamental explanation workflow.
 *
 * @param processType - Workflow variant name
 */
export function getWorkflow(processType: string): StepType[] {
  const parsed = ProcessTypeSchema.safeParse(processType);
  const workflow = parsed.success ? parsed.data : 'fundamental_explanation';
  return [...DEFAULT_WORKFLOWS[workflow]];
}
