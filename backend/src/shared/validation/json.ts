/**
 * backend/src/shared/validation/json.ts
 *
 * Zod schemas for free-form jsonb payloads (brand configuration, enrichment data).
 */

import { z } from 'zod';

import type { JsonObject, JsonValue } from '../db/database.schema';

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ]),
);

export const jsonObjectSchema: z.ZodType<JsonObject> = z.record(jsonValueSchema);
