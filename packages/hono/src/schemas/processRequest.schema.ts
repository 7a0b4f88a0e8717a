import { z } from 'zod';

/**
 * Path parameter of the per-process routes.
 */
export const ProcessIdParamSchema = z.uuid('process id must be a UUID');

export const StartProcessRequestSchema = z.object({
  user_id: z.string(),
  topic: z.string(),
  process_type: z.string().optional(),
});
export type StartProcessRequest = z.infer<typeof StartProcessRequestSchema>;

export const ListProcessesQuerySchema = z.object({
  user_id: z.string().min(1).optional(),
  limit: z.coerce.number().int().positive().optional(),
});
export type ListProcessesQuery = z.infer<typeof ListProcessesQuerySchema>;

export const AdvanceRequestSchema = z.object({
  user_input: z.string().nullish(),
});
export type AdvanceRequest = z.infer<typeof AdvanceRequestSchema>;

export const SuggestNextStepRequestSchema = z.object({
  score: z.number().min(0).max(1).optional(),
  apply: z.boolean().optional(),
});
export type SuggestNextStepRequest = z.infer<typeof SuggestNextStepRequestSchema>;
