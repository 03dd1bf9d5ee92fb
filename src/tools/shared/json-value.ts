/**
 * Schema for arbitrary JSON values carried through to the request body
 */

import { z } from 'zod';
import type { JsonValue } from '../../types/request.js';

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ])
);
