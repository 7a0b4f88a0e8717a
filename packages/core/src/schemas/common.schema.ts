import { z } from 'zod';

import type { JsonValue } from '../interfaces/json.js';

/**
 * Common validation schemas used across the education packages
 */

export const SessionIdSchema = z.uuid('sessionId must be a UUID');

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(z.string(), JsonValueSchema),
  ]),
);
