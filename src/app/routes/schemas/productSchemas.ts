/**
 * Product API Schemas
 * JSON Schema definitions for Swagger/OpenAPI documentation
 */

const product = {
  type: 'object',
  properties: {
    id: { type: 'integer' },
    name: { type: 'string' },
    createdAt: { type: 'string', format: 'date-time' },
    updatedAt: { type: 'string', format: 'date-time' },
  },
} as const;

const error = {
  type: 'object',
  properties: {
    error: { type: 'string' },
    message: { type: 'string' },
    statusCode: { type: 'integer' },
    details: {},
    requestId: { type: 'string' },
    timestamp: { type: 'string', format: 'date-time' },
  },
} as const;

export const productSchemas = {
  product,

  productList: {
    type: 'object',
    properties: {
      items: { type: 'array', items: product },
      total: { type: 'integer' },
      limit: { type: 'integer' },
      offset: { type: 'integer' },
    },
  },

  availability: {
    type: 'object',
    properties: {
      productId: { type: 'integer' },
      status: { type: 'string', enum: ['in_stock', 'out_of_stock', 'unknown'] },
      quantity: { type: ['integer', 'null'] },
      source: { type: 'string', enum: ['live', 'fallback'] },
    },
  },

  error,

  idParam: {
    type: 'object',
    properties: {
      id: { type: 'integer', minimum: 1, description: 'Product ID' },
    },
    required: ['id'],
  },

  listQuery: {
    type: 'object',
    properties: {
      limit: { type: 'integer', minimum: 1, maximum: 100, default: 20, description: 'Items per page' },
      offset: { type: 'integer', minimum: 0, default: 0, description: 'Items to skip' },
    },
  },

  createBody: {
    type: 'object',
    required: ['name'],
    properties: {
      name: { type: 'string', minLength: 1, maxLength: 100 },
    },
  },

  updateBody: {
    type: 'object',
    properties: {
      name: { type: 'string', minLength: 1, maxLength: 100 },
    },
  },
} as const;
