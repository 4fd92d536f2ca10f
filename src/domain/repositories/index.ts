export type { IRepository } from './IRepository.js';
export type { IProductRepository } from './IProductRepository.js';
