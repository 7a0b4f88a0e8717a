import { z } from 'zod';

import { JsonValueSchema } from './common.schema.js';

export const ProcessTypeSchema = z.enum([
  'fundamental_explanation',
  'guided_practice',
  'assessment',
]);
export type ProcessType = z.infer<typeof ProcessTypeSchema>;

export const StepTypeSchema = z.enum(['explain', 'example', 'exercise', 'evaluate', 'feedback']);
export type StepType = z.infer<typeof StepTypeSchema>;

/**
 * A step result as persisted inside the `history` document.
 * Older rows may lack content, context or timestamp; those are filled in on read.
 */
export const StoredStepResultSchema = z
  .object({
    step: StepTypeSchema,
    content: z.string().default(''),
    context: z.record(z.string(), JsonValueSchema).default({}),
    created_at: z.string().optional(),
  })
  .transform(({ created_at, ...result }) => ({
    ...result,
    createdAt: created_at ?? new Date().toISOString(),
  }));
export type StepResult = z.output<typeof StoredStepResultSchema>;

/**
 * The typed view of a session's workflow state.
 */
export const ProcessStateSchema = z.object({
  processType: ProcessTypeSchema,
  steps: z.array(StepTypeSchema),
  history: z.array(StoredStepResultSchema),
});

export const StartProcessSchema = z.object({
  userId: z.string().min(1, 'userId is required'),
  topic: z.string().min(1, 'topic is required'),
  processType: ProcessTypeSchema.default('fundamental_explanation'),
});

/** Process type is checked against the known workflows at runtime. */
export interface StartProcessParams {
  userId: string;
  topic: string;
  processType?: string;
}

export const SuggestNextStepSchema = z.object({
  score: z.number().min(0).max(1).optional(),
  apply: z.boolean().default(false),
});
export type SuggestNextStepParams = z.input<typeof SuggestNextStepSchema>;

export const ListProcessesSchema = z.object({
  userId: z.string().min(1).optional(),
  limit: z.number().int().positive().default(100),
});
export type ListProcessesParams = z.input<typeof ListProcessesSchema>;
