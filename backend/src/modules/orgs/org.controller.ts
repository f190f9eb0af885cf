/**
 * backend/src/modules/orgs/org.controller.ts
 *
 * WHY:
 * - Maps HTTP -> service call.
 * - Validates request payload and returns the success envelope.
 *
 * RULES:
 * - No DB access here.
 * - No business rules here.
 * - Validate with Zod and throw AppError.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import { AppError } from '../../shared/http/errors';
import { ok } from '../../shared/http/envelope';
import { claimsFor, requireUser } from '../../shared/http/require-user';
import { createOrgSchema } from './org.schemas';
import type { OrgService } from './org.service';

export class OrgController {
  constructor(private readonly orgService: OrgService) {}

  async getMyOrg(req: FastifyRequest, reply: FastifyReply) {
    const auth = requireUser(req);

    const result = await this.orgService.getMyOrg({
      claims: claimsFor(auth),
      orgId: auth.orgId,
      requestId: req.requestContext.requestId,
    });

    return reply.status(200).send(ok(result));
  }

  async createOrg(req: FastifyRequest, reply: FastifyReply) {
    const auth = requireUser(req, { superuser: true });

    const parsed = createOrgSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', {
        issues: parsed.error.issues,
      });
    }

    const result = await this.orgService.createOrg({
      claims: claimsFor(auth),
      orgSlug: parsed.data.orgSlug,
      requestId: req.requestContext.requestId,
    });

    return reply.status(201).send(ok(result));
  }
}
