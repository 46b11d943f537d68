// Base class for every error the catalog raises on purpose. Each one is
// scoped to a single request and is never retried.
export class CatalogError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number = 400,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'CatalogError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class SelfParentError extends CatalogError {
  constructor(categoryId: string) {
    super('A category cannot be its own parent', 'SELF_PARENT', 400, { categoryId });
    this.name = 'SelfParentError';
  }
}

export class CyclicReferenceError extends CatalogError {
  constructor(categoryId: string | null, parentId: string) {
    super(
      'This would create a circular reference in the category hierarchy',
      'CYCLIC_REFERENCE',
      400,
      { categoryId, parentId }
    );
    this.name = 'CyclicReferenceError';
  }
}

export class ActiveChildrenExistError extends CatalogError {
  constructor(categoryId: string, activeChildren: number) {
    super(
      'Cannot deactivate a category that has active subcategories',
      'ACTIVE_CHILDREN_EXIST',
      400,
      { categoryId, activeChildren }
    );
    this.name = 'ActiveChildrenExistError';
  }
}

export class MultiplePrimaryCategoriesError extends CatalogError {
  constructor(bookId: string) {
    super('A book can have only one primary category', 'MULTIPLE_PRIMARY_CATEGORIES', 400, { bookId });
    this.name = 'MultiplePrimaryCategoriesError';
  }
}

export class NotFoundError extends CatalogError {
  constructor(entity: string, id: string) {
    super(`${entity} with ID ${id} not found`, `${entity.replace(/\s+/g, '_').toUpperCase()}_NOT_FOUND`, 404);
    this.name = 'NotFoundError';
  }
}

export class ConflictError extends CatalogError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFLICT', 409, details);
    this.name = 'ConflictError';
  }
}

/**
 * Raised when a storage-level backstop rejects a write. Seeing one means an
 * application check was skipped or lost a race.
 */
export class ConstraintViolationError extends CatalogError {
  constructor(constraint: string, message: string = `Constraint ${constraint} violated`) {
    super(message, 'CONSTRAINT_VIOLATION', 409, { constraint });
    this.name = 'ConstraintViolationError';
  }
}
