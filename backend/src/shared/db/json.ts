/**
 * backend/src/shared/db/json.ts
 *
 * Helpers for jsonb columns: narrow what the driver hands back, cast what we write.
 */

import { sql, type RawBuilder } from 'kysely';

import type { JsonObject } from './database.schema';

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Driver output → JsonObject. Anything that is not a plain object becomes {}. */
export function toJsonObject(value: unknown): JsonObject {
  if (isJsonObject(value)) return value;

  if (typeof value === 'string') {
    try {
      const parsed: unknown = JSON.parse(value);
      return isJsonObject(parsed) ? parsed : {};
    } catch {
      return {};
    }
  }

  return {};
}

/** Write-side value for a jsonb column: sent as JSON text, cast by Postgres. */
export function jsonb(value: JsonObject): RawBuilder<JsonObject> {
  return sql<JsonObject>`${JSON.stringify(value)}::jsonb`;
}
