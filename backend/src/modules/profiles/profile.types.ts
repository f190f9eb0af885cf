/**
 * backend/src/modules/profiles/profile.types.ts
 *
 * WHY:
 * - Domain types for the Profiles module.
 * - A profile is the app-side row for an identity-provider user (same id).
 *
 * RULES:
 * - Avoid leaking DB naming (snake_case) outside DAL/queries.
 */

export type Profile = {
  id: string;
  isSuperuser: boolean;
  orgId: number | null;
  isActivated: boolean;

  createdAt: Date;
  updatedAt: Date;
};
