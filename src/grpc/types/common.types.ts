/**
 * Message shapes of catalog.proto (snake_case, as loaded with keepCase)
 */
import type * as grpc from '@grpc/grpc-js';
import type { GrpcErrorResponse } from '../../shared/errors/index.js';

export type GrpcCallback<T> = grpc.sendUnaryData<T>;

export interface ProductMessage {
  id: number;
  name: string;
  created_at: string;
  updated_at: string;
}

export interface GetProductRequest {
  id: number;
}

export interface ListProductsRequest {
  limit: number;
  offset: number;
}

export interface CreateProductRequest {
  name: string;
}

export interface ProductResponse {
  success: true;
  message: string;
  status_code: number;
  product: ProductMessage;
}

export interface ListProductsResponse {
  success: true;
  message: string;
  status_code: number;
  items: ProductMessage[];
  total: number;
  limit: number;
  offset: number;
}

/** Every unary handler answers with its payload or the in-band error shape */
export type Reply<T> = T | GrpcErrorResponse;
