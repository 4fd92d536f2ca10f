/**
 * gRPC ProductService Handlers
 * Implements catalog.v1.ProductService on top of the same use cases as HTTP.
 */
import type { AwilixContainer } from 'awilix';
import { TOKENS, type Cradle } from '../../container.js';
import type { Product } from '../../domain/models/Product.js';
import { HttpStatus } from '../../shared/errors/index.js';
import { ROLES } from '../../app/middlewares/auth.js';
import { createGrpcHandler } from '../utils/handlerWrapper.js';
import { requireGrpcRoles } from '../interceptors/authInterceptor.js';
import type {
  CreateProductRequest,
  GetProductRequest,
  ListProductsRequest,
  ListProductsResponse,
  ProductMessage,
  ProductResponse,
} from '../types/common.types.js';

export function toProductMessage(product: Product): ProductMessage {
  return {
    id: product.id,
    name: product.name,
    created_at: product.createdAt.toISOString(),
    updated_at: product.updatedAt.toISOString(),
  };
}

export function createProductServiceHandlers(container: AwilixContainer<Cradle>) {
  const logger = container.resolve(TOKENS.Logger);
  const canWrite = requireGrpcRoles(
    container.resolve(TOKENS.TokenVerifier),
    logger,
    ROLES.CATALOG_WRITE,
    ROLES.ADMIN
  );

  return {
    GetProduct: createGrpcHandler<GetProductRequest, ProductResponse>({
      name: 'GetProduct',
      logger,
      handler: async ({ id }) => {
        const product = await container.resolve(TOKENS.GetProductUseCase).execute({ id });
        return {
          success: true,
          message: 'OK',
          status_code: HttpStatus.OK,
          product: toProductMessage(product),
        };
      },
    }),

    // Proto3 sends 0 for unset fields; 0 means "use the default"
    ListProducts: createGrpcHandler<ListProductsRequest, ListProductsResponse>({
      name: 'ListProducts',
      logger,
      handler: async ({ limit, offset }) => {
        const result = await container.resolve(TOKENS.ListProductsUseCase).execute({
          limit: limit > 0 ? limit : undefined,
          offset: offset > 0 ? offset : undefined,
        });
        return {
          success: true,
          message: 'OK',
          status_code: HttpStatus.OK,
          items: result.items.map(toProductMessage),
          total: result.total,
          limit: result.limit,
          offset: result.offset,
        };
      },
    }),

    CreateProduct: createGrpcHandler<CreateProductRequest, ProductResponse>({
      name: 'CreateProduct',
      logger,
      authorize: canWrite,
      handler: async ({ name }) => {
        const product = await container.resolve(TOKENS.CreateProductUseCase).execute({ name });
        return {
          success: true,
          message: 'Product created',
          status_code: HttpStatus.CREATED,
          product: toProductMessage(product),
        };
      },
    }),
  };
}
