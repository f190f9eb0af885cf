/**
 * backend/src/shared/db/database.schema.ts
 *
 * WHY:
 * - Kysely table interfaces for the public schema (orgs, profiles, brands).
 * - Mirrors the migrations in ./migrations; update both together.
 *
 * NOTES:
 * - int8 columns are parsed to JS numbers by the type parser in db.ts (ids stay
 *   far below 2^53).
 * - jsonb columns are written through the jsonb() helper in json.ts.
 */

import type { ColumnType } from 'kysely';

export type Generated<T> =
  T extends ColumnType<infer S, infer I, infer U>
    ? ColumnType<S, I | undefined, U>
    : ColumnType<T, T | undefined, T>;

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export type Int8 = ColumnType<number, bigint | number | string, bigint | number | string>;

export type Timestamp = ColumnType<Date, Date | string, Date | string>;

export interface Orgs {
  org_id: Generated<Int8>;
  org_slug: string;
  created_at: Generated<Timestamp>;
  updated_at: Generated<Timestamp>;
}

export interface Profiles {
  id: string;
  is_superuser: Generated<boolean>;
  org_id: Int8 | null;
  is_activated: Generated<boolean>;
  created_at: Generated<Timestamp>;
  updated_at: Generated<Timestamp>;
}

export interface Brands {
  brand_id: Generated<Int8>;
  name: string;
  slug: string;
  description: string | null;
  category_id: Int8 | null;
  configuration: ColumnType<JsonObject, JsonObject | undefined, JsonObject>;
  enrichment_data: ColumnType<JsonObject, JsonObject | undefined, JsonObject>;
  created_at: Generated<Timestamp>;
  updated_at: Generated<Timestamp>;
}

export interface DB {
  orgs: Orgs;
  profiles: Profiles;
  brands: Brands;
}
