/**
 * backend/src/modules/profiles/index.ts
 *
 * WHY:
 * - Define the public surface of the profiles module.
 *
 * RULES:
 * - Only export stable contracts needed by other modules.
 */

export { ensureProfile } from './use-cases/ensure-profile.usecase';
export type { ProfileRepo } from './dal/profile.repo';
export type { Profile } from './profile.types';
