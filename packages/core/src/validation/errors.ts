export type FieldError = {
  field: string;
  message: string;
};

/**
 * Error thrown when a value fails JSON-Schema validation
 */
export class SchemaValidationError extends Error {
  public readonly schema: string;
  public readonly errors: FieldError[];

  constructor(schema: string, errors: FieldError[]) {
    const summary = errors.map((e) => `${e.field}: ${e.message}`).join('; ');
    super(`Invalid ${schema}: ${summary}`);
    this.name = 'SchemaValidationError';
    this.schema = schema;
    this.errors = errors;
    Object.setPrototypeOf(this, SchemaValidationError.prototype);
  }
}
