import { z } from 'zod';

import { JsonValueSchema } from './common.schema.js';

/**
 * Row-level constraints of an education session, as enforced by the database:
 * required text columns, JSON documents for steps/history and an integer cursor.
 */
export const NewEducationSessionSchema = z.object({
  id: z.uuid().optional().describe('Explicit session id; generated when omitted'),
  userId: z.string().describe('Owning user'),
  topic: z.string().describe('Free-text subject'),
  processType: z.string().describe('Workflow variant, not validated by the store'),
  steps: z.array(JsonValueSchema).default([]),
  currentIndex: z.number().int().default(0),
  history: z.array(JsonValueSchema).default([]),
});

export const EducationSessionUpdateSchema = NewEducationSessionSchema.pick({
  topic: true,
  processType: true,
})
  .extend({
    steps: z.array(JsonValueSchema),
    currentIndex: z.number().int(),
    history: z.array(JsonValueSchema),
  })
  .partial();
