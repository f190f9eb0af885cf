/**
 * backend/src/modules/brands/brand.routes.ts
 *
 * WHY:
 * - Declares Brands module endpoints.
 *
 * RULES:
 * - No business logic here.
 */

import type { FastifyInstance } from 'fastify';
import type { BrandController } from './brand.controller';

export function registerBrandRoutes(app: FastifyInstance, controller: BrandController) {
  app.get('/brands', controller.listBrands.bind(controller));
  app.get('/brands/:slug', controller.getBrand.bind(controller));
  app.post('/brands', controller.createBrand.bind(controller));
  app.patch('/brands/:slug', controller.updateBrand.bind(controller));
  app.delete('/brands/:slug', controller.deleteBrand.bind(controller));
}
