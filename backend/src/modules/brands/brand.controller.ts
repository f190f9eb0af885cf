/**
 * backend/src/modules/brands/brand.controller.ts
 *
 * WHY:
 * - Maps HTTP -> service call.
 * - Validates path, query and body, returns the success envelope.
 *
 * RULES:
 * - No DB access here.
 * - No business rules here.
 * - Mutations check superuser BEFORE parsing the body: a non-superuser gets 403
 *   whatever they send.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import type { ZodIssue } from 'zod';
import { AppError } from '../../shared/http/errors';
import { ok } from '../../shared/http/envelope';
import { claimsFor, requireUser } from '../../shared/http/require-user';
import { slugParamsSchema } from '../../shared/validation/slug';
import { createBrandSchema, listBrandsQuerySchema, updateBrandSchema } from './brand.schemas';
import type { BrandService } from './brand.service';

function invalid(message: string, issues: ZodIssue[]) {
  return AppError.validationError(message, { issues });
}

export class BrandController {
  constructor(private readonly brandService: BrandService) {}

  private parseSlug(req: FastifyRequest): string {
    const parsed = slugParamsSchema.safeParse(req.params);
    if (!parsed.success) throw invalid('Invalid brand slug', parsed.error.issues);
    return parsed.data.slug;
  }

  async listBrands(req: FastifyRequest, reply: FastifyReply) {
    const auth = requireUser(req);

    const parsed = listBrandsQuerySchema.safeParse(req.query);
    if (!parsed.success) throw invalid('Invalid query parameters', parsed.error.issues);

    const brands = await this.brandService.listBrands({
      claims: claimsFor(auth),
      requestId: req.requestContext.requestId,
      filter: parsed.data,
    });

    return reply.status(200).send(ok(brands));
  }

  async getBrand(req: FastifyRequest, reply: FastifyReply) {
    const auth = requireUser(req);
    const slug = this.parseSlug(req);

    const brand = await this.brandService.getBrand({
      claims: claimsFor(auth),
      requestId: req.requestContext.requestId,
      slug,
    });

    return reply.status(200).send(ok(brand));
  }

  async createBrand(req: FastifyRequest, reply: FastifyReply) {
    const auth = requireUser(req, { superuser: true });

    const parsed = createBrandSchema.safeParse(req.body);
    if (!parsed.success) throw invalid('Invalid request body', parsed.error.issues);

    const brand = await this.brandService.createBrand({
      claims: claimsFor(auth),
      requestId: req.requestContext.requestId,
      brand: parsed.data,
    });

    return reply.status(201).send(ok(brand));
  }

  async updateBrand(req: FastifyRequest, reply: FastifyReply) {
    const auth = requireUser(req, { superuser: true });
    const slug = this.parseSlug(req);

    const parsed = updateBrandSchema.safeParse(req.body);
    if (!parsed.success) throw invalid('Invalid request body', parsed.error.issues);

    const brand = await this.brandService.updateBrand({
      claims: claimsFor(auth),
      requestId: req.requestContext.requestId,
      slug,
      patch: parsed.data,
    });

    return reply.status(200).send(ok(brand));
  }

  async deleteBrand(req: FastifyRequest, reply: FastifyReply) {
    const auth = requireUser(req, { superuser: true });
    const slug = this.parseSlug(req);

    const result = await this.brandService.deleteBrand({
      claims: claimsFor(auth),
      requestId: req.requestContext.requestId,
      slug,
    });

    return reply.status(200).send(ok(result));
  }
}
