/**
 * backend/src/modules/orgs/org.errors.ts
 *
 * WHY:
 * - Orgs module owns its domain semantics.
 * - Keeps shared/http/errors.ts small and stable.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Put org-specific meaning here: messages + safe meta.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const OrgErrors = {
  orgNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('Organization not found', meta);
  },

  notAMember(meta?: AppErrorMeta) {
    return AppError.forbidden('You are not a member of this organization.', meta);
  },

  noOrgAssigned(meta?: AppErrorMeta) {
    return AppError.notFound('You are not a member of any organization.', meta);
  },

  orgSlugTaken(meta?: AppErrorMeta) {
    return AppError.conflict('Organization slug already exists', meta);
  },
} as const;
