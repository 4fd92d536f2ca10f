export { BaseUseCase, type IUseCase } from './BaseUseCase.js';
export * from './product/index.js';
