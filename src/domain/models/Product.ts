import { ValidationError } from '../../shared/errors/AppError.js';

export const PRODUCT_NAME_MAX_LENGTH = 100;

export interface ProductProps {
  id?: number;
  name: string;
  createdAt?: Date;
  updatedAt?: Date;
}

/** Row shape of the `products` table. Timestamps arrive as strings from cache */
export interface ProductRow {
  id: number;
  name: string;
  created_at: Date | string;
  updated_at: Date | string;
}

export interface ProductView {
  id: number;
  name: string;
  createdAt: string;
  updatedAt: string;
}

/**
 * Catalog product. A product without an id (0) has not been persisted yet.
 */
export class Product {
  private _id: number;
  private _name: string;
  private readonly _createdAt: Date;
  private _updatedAt: Date;

  constructor(props: ProductProps) {
    this._id = props.id ?? 0;
    this._name = props.name;
    this._createdAt = props.createdAt ?? new Date();
    this._updatedAt = props.updatedAt ?? this._createdAt;
  }

  get id(): number {
    return this._id;
  }

  get name(): string {
    return this._name;
  }

  get createdAt(): Date {
    return this._createdAt;
  }

  get updatedAt(): Date {
    return this._updatedAt;
  }

  get isPersisted(): boolean {
    return this._id > 0;
  }

  /**
   * Trims and checks a candidate name. Blank or over-long names are rejected.
   */
  static normalizeName(name: string): string {
    const trimmed = name.trim();
    if (trimmed.length === 0) {
      throw new ValidationError('Product name must not be blank', {
        field: 'name',
        constraint: 'required',
      });
    }
    if (trimmed.length > PRODUCT_NAME_MAX_LENGTH) {
      throw new ValidationError(
        `Product name must be at most ${PRODUCT_NAME_MAX_LENGTH} characters`,
        { field: 'name', constraint: 'maxLength', value: trimmed.length }
      );
    }
    return trimmed;
  }

  static create(data: { name: string }): Product {
    return new Product({ name: Product.normalizeName(data.name) });
  }

  static fromPersistence(row: ProductRow): Product {
    return new Product({
      id: row.id,
      name: row.name,
      createdAt: new Date(row.created_at),
      updatedAt: new Date(row.updated_at),
    });
  }

  /** Assigned by the repository on insert */
  withId(id: number): Product {
    if (!Number.isInteger(id) || id <= 0) {
      throw new ValidationError('Product id must be a positive integer', { field: 'id', value: id });
    }
    return new Product({
      id,
      name: this._name,
      createdAt: this._createdAt,
      updatedAt: this._updatedAt,
    });
  }

  /**
   * Returns false when the normalized name is unchanged.
   */
  rename(name: string): boolean {
    const normalized = Product.normalizeName(name);
    if (normalized === this._name) {
      return false;
    }
    this._name = normalized;
    this._updatedAt = new Date();
    return true;
  }

  hasSameName(name: string): boolean {
    return this._name.toLowerCase() === name.trim().toLowerCase();
  }

  toPersistence(): ProductRow {
    return {
      id: this._id,
      name: this._name,
      created_at: this._createdAt,
      updated_at: this._updatedAt,
    };
  }

  toJSON(): ProductView {
    return {
      id: this._id,
      name: this._name,
      createdAt: this._createdAt.toISOString(),
      updatedAt: this._updatedAt.toISOString(),
    };
  }
}
