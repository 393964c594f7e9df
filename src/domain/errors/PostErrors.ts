/**
 * Base class for failures a caller can act on. `status` is the HTTP status the
 * presentation layer answers with.
 */
export class PostStoreError extends Error {
  constructor(
    message: string,
    readonly status: number
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends PostStoreError {
  constructor(message: string) {
    super(message, 400);
  }
}

export class NotFoundError extends PostStoreError {
  constructor(message = "Post not found") {
    super(message, 404);
  }
}

/**
 * The persisted collection exists but cannot be used. Not a caller error, so
 * it carries no status and surfaces as a 500.
 */
export class StorageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "StorageError";
  }
}
