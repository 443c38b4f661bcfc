/**
 * Base class for errors raised by the factories themselves.
 * Database errors raised while inserting are never wrapped in a FactoryError:
 * they reach the caller unchanged.
 *
 * @example
 * ```typescript
 * try {
 *   await userFactory.set('homeCity', null).insert(db);
 * } catch (error) {
 *   if (isFactoryError(error)) {
 *     console.log(error.toJSON());
 *   }
 * }
 * ```
 */
export class FactoryError extends Error {
  /** Type discriminator for runtime type checking */
  public readonly isFactoryError = true;
  /** Additional context about the failure */
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    options?: {
      details?: Record<string, unknown>;
      cause?: unknown;
    },
  ) {
    super(message);
    this.name = this.constructor.name;
    this.details = options?.details;

    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Serializes the error to a JSON-compatible object.
   */
  toJSON() {
    return {
      name: this.name,
      message: this.message,
      details: this.details,
      stack: this.stack,
    };
  }
}

/**
 * Raised when the database accepted an insert but returned no row.
 */
export class FactoryInsertError extends FactoryError {
  constructor(public readonly table: string) {
    super(`Failed to insert into ${table}`, { details: { table } });
  }
}

/**
 * Raised when a persisted record carries no value in its primary key column.
 * Usually means a plain object was passed where an inserted record was expected.
 */
export class MissingPrimaryKeyError extends FactoryError {
  constructor(
    public readonly table: string,
    public readonly primaryKey: string,
  ) {
    super(`Record for ${table} has no value in primary key "${primaryKey}"`, {
      details: { table, primaryKey },
    });
  }
}

/**
 * Raised when `null` is assigned to an association that was not declared optional.
 */
export class RequiredAssociationError extends FactoryError {
  constructor(
    public readonly table: string,
    public readonly association: string,
  ) {
    super(`Association "${association}" of ${table} cannot be null`, {
      details: { table, association },
    });
  }
}

/**
 * Raised when the factory environment variables fail validation.
 */
export class FactoryConfigError extends FactoryError {
  constructor(public readonly issues: string[]) {
    super(`Invalid factory configuration: ${issues.join('; ')}`, {
      details: { issues },
    });
  }
}

export function isFactoryError(error: unknown): error is FactoryError {
  return error instanceof FactoryError;
}
