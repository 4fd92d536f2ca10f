import type { FastifyPluginAsync } from 'fastify';
import type { AwilixContainer } from 'awilix';
import { z } from 'zod';
import { TOKENS, type Cradle } from '../../container.js';
import { PRODUCT_NAME_MAX_LENGTH } from '../../domain/models/Product.js';
import { MAX_PAGE_SIZE } from '../../application/useCases/index.js';
import { createValidator, requireRoles, ROLES } from '../middlewares/index.js';
import { productSchemas } from './schemas/productSchemas.js';

export interface ProductRoutesOptions {
  container: AwilixContainer<Cradle>;
}

const idParams = z.object({
  id: z.coerce.number().int().positive(),
});

const nameField = z
  .string({ required_error: 'Name is required' })
  .trim()
  .min(1, 'Name must not be blank')
  .max(PRODUCT_NAME_MAX_LENGTH, `Name must be at most ${PRODUCT_NAME_MAX_LENGTH} characters`);

const listRequest = z.object({
  query: z.object({
    limit: z.coerce.number().int().min(1).max(MAX_PAGE_SIZE).optional(),
    offset: z.coerce.number().int().min(0).optional(),
  }),
});

const byIdRequest = z.object({ params: idParams });

const createRequest = z.object({
  body: z.object({ name: nameField }),
});

const updateRequest = z.object({
  params: idParams,
  body: z.object({ name: nameField.optional() }),
});

const BEARER = [{ bearerAuth: [] }];

/**
 * Product Routes, mounted at /api/v1/products.
 * Reads are public; writes need `catalog:write` or `admin`, deletes need `admin`.
 */
export const productRoutes: FastifyPluginAsync<ProductRoutesOptions> = async (fastify, { container }) => {
  const canWrite = [fastify.authenticate, requireRoles(ROLES.CATALOG_WRITE, ROLES.ADMIN)];
  const canDelete = [fastify.authenticate, requireRoles(ROLES.ADMIN)];

  fastify.get('/', {
    schema: {
      tags: ['Products'],
      summary: 'List products',
      description: 'Returns a page of products ordered by id, with the total count',
      querystring: productSchemas.listQuery,
      response: { 200: productSchemas.productList },
    },
    handler: createValidator(listRequest, async ({ query }) => {
      const result = await container.resolve(TOKENS.ListProductsUseCase).execute(query);
      return { ...result, items: result.items.map((product) => product.toJSON()) };
    }),
  });

  fastify.get('/:id', {
    schema: {
      tags: ['Products'],
      summary: 'Get product by ID',
      params: productSchemas.idParam,
      response: { 200: productSchemas.product, 404: productSchemas.error },
    },
    handler: createValidator(byIdRequest, async ({ params }) => {
      const product = await container.resolve(TOKENS.GetProductUseCase).execute({ id: params.id });
      return product.toJSON();
    }),
  });

  fastify.get('/:id/availability', {
    schema: {
      tags: ['Products'],
      summary: 'Get product availability',
      description:
        'Stock level from the inventory service. Answers `unknown` from the fallback when inventory is unreachable.',
      params: productSchemas.idParam,
      response: { 200: productSchemas.availability, 404: productSchemas.error },
    },
    handler: createValidator(byIdRequest, async ({ params }) =>
      container.resolve(TOKENS.GetProductAvailabilityUseCase).execute({ id: params.id })
    ),
  });

  fastify.post('/', {
    schema: {
      tags: ['Products'],
      summary: 'Create a product',
      security: BEARER,
      body: productSchemas.createBody,
      response: { 201: productSchemas.product, 409: productSchemas.error },
    },
    preHandler: canWrite,
    handler: createValidator(createRequest, async ({ body }, _request, reply) => {
      const product = await container.resolve(TOKENS.CreateProductUseCase).execute({ name: body.name });
      void reply.status(201);
      return product.toJSON();
    }),
  });

  fastify.put('/:id', {
    schema: {
      tags: ['Products'],
      summary: 'Rename a product',
      security: BEARER,
      params: productSchemas.idParam,
      body: productSchemas.updateBody,
      response: { 200: productSchemas.product, 404: productSchemas.error, 409: productSchemas.error },
    },
    preHandler: canWrite,
    handler: createValidator(updateRequest, async ({ params, body }) => {
      const product = await container
        .resolve(TOKENS.UpdateProductUseCase)
        .execute({ id: params.id, name: body.name });
      return product.toJSON();
    }),
  });

  fastify.delete('/:id', {
    schema: {
      tags: ['Products'],
      summary: 'Delete a product',
      security: BEARER,
      params: productSchemas.idParam,
      response: { 404: productSchemas.error },
    },
    preHandler: canDelete,
    handler: createValidator(byIdRequest, async ({ params }, _request, reply) => {
      await container.resolve(TOKENS.DeleteProductUseCase).execute({ id: params.id });
      return reply.status(204).send();
    }),
  });
};
