/**
 * Data access contract. Lives in the domain layer so use cases depend on
 * the interface and infrastructure supplies the implementation.
 */
export interface IRepository<T> {
  findById(id: number): Promise<T | null>;

  findAll(limit: number, offset: number): Promise<T[]>;

  count(): Promise<number>;

  /**
   * Persist a new entity and return it with its assigned id
   */
  create(entity: T): Promise<T>;

  /**
   * @returns false when no row matched
   */
  update(entity: T): Promise<boolean>;

  delete(id: number): Promise<boolean>;
}
