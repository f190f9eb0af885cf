/**
 * backend/src/modules/invites/invite.errors.ts
 *
 * WHY:
 * - Invites module owns its domain semantics.
 * - Prevents shared/http/errors.ts from becoming a giant god-file.
 *
 * SECURITY:
 * - Never include signed invite links or access tokens in meta.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const InviteErrors = {
  orgSlugMissing(meta?: AppErrorMeta) {
    return AppError.unprocessable('No organization found in invite', meta);
  },

  deliveryFailed(message: string, meta?: AppErrorMeta) {
    return AppError.upstream(message, meta);
  },
} as const;
