/**
 * backend/src/modules/invites/invite.controller.ts
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
import { requireUser } from '../../shared/http/require-user';
import { inviteOrgParamsSchema, issueInviteSchema } from './invite.schemas';
import type { InviteService } from './invite.service';

export class InviteController {
  constructor(private readonly inviteService: InviteService) {}

  async issueInvite(req: FastifyRequest, reply: FastifyReply) {
    const auth = requireUser(req);

    const params = inviteOrgParamsSchema.safeParse(req.params);
    if (!params.success) {
      throw AppError.validationError('Invalid organization slug', {
        issues: params.error.issues,
      });
    }

    const parsed = issueInviteSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', {
        issues: parsed.error.issues,
      });
    }

    const result = await this.inviteService.issueInvite({
      caller: {
        userId: auth.userId,
        email: auth.email,
        orgId: auth.orgId,
        isSuperuser: auth.isSuperuser,
      },
      orgSlug: params.data.slug,
      email: parsed.data.email,
      requestId: req.requestContext.requestId,
    });

    return reply.status(201).send(ok(result));
  }

  async acceptInvite(req: FastifyRequest, reply: FastifyReply) {
    const auth = requireUser(req);

    const result = await this.inviteService.acceptInvite({
      userId: auth.userId,
      userMetadata: auth.userMetadata,
      requestId: req.requestContext.requestId,
    });

    return reply.status(200).send(ok(result));
  }
}
