export { CreateProductUseCase, type CreateProductInput } from './CreateProductUseCase.js';
export { GetProductUseCase, type GetProductInput } from './GetProductUseCase.js';
export {
  ListProductsUseCase,
  DEFAULT_PAGE_SIZE,
  MAX_PAGE_SIZE,
  type ListProductsInput,
  type ListProductsOutput,
} from './ListProductsUseCase.js';
export { UpdateProductUseCase, type UpdateProductInput } from './UpdateProductUseCase.js';
export { DeleteProductUseCase, type DeleteProductInput } from './DeleteProductUseCase.js';
export {
  GetProductAvailabilityUseCase,
  type GetProductAvailabilityInput,
  type ProductAvailability,
  type AvailabilityStatus,
} from './GetProductAvailabilityUseCase.js';
