/**
 * backend/src/modules/profiles/profile.controller.ts
 *
 * WHY:
 * - Maps HTTP -> service call.
 *
 * RULES:
 * - No DB access here.
 * - No business rules here.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import { ok } from '../../shared/http/envelope';
import { claimsFor, requireUser } from '../../shared/http/require-user';
import type { ProfileService } from './profile.service';

export class ProfileController {
  constructor(private readonly profileService: ProfileService) {}

  async listProfiles(req: FastifyRequest, reply: FastifyReply) {
    const auth = requireUser(req);
    const profiles = await this.profileService.listProfiles(claimsFor(auth));
    return reply.status(200).send(ok(profiles));
  }

  async getMyProfile(req: FastifyRequest, reply: FastifyReply) {
    const auth = requireUser(req);
    const profile = await this.profileService.getMyProfile(claimsFor(auth));
    return reply.status(200).send(ok(profile));
  }
}
