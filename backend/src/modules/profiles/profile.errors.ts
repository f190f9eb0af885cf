/**
 * backend/src/modules/profiles/profile.errors.ts
 *
 * RULES:
 * - Use AppError as the transport primitive.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const ProfileErrors = {
  profileNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('Profile not found', meta);
  },
} as const;
