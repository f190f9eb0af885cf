/**
 * backend/src/modules/brands/brand.module.ts
 *
 * WHY:
 * - Encapsulates Brands module wiring.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 */

import type { FastifyInstance } from 'fastify';
import type { ScopedDb } from '../../shared/db/scoped-db';
import type { Logger } from '../../shared/logger/logger';

import { BrandController } from './brand.controller';
import { BrandService } from './brand.service';
import { registerBrandRoutes } from './brand.routes';
import { BrandRepo } from './dal/brand.repo';

export type BrandModule = ReturnType<typeof createBrandModule>;

export function createBrandModule(deps: { scopedDb: ScopedDb; logger: Logger }) {
  const brandRepo = new BrandRepo(deps.scopedDb.service);

  const brandService = new BrandService({
    scopedDb: deps.scopedDb,
    logger: deps.logger,
    brandRepo,
  });

  const controller = new BrandController(brandService);

  return {
    brandRepo,
    brandService,
    registerRoutes(app: FastifyInstance) {
      registerBrandRoutes(app, controller);
    },
  };
}
