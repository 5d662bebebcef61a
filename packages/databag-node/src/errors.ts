export class DatabagError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DatabagError';
    Object.setPrototypeOf(this, DatabagError.prototype);
  }

  public toErrorPlainObject() {
    return {
      name: this.name,
      message: this.message,
      stack: this.stack,
    };
  }
}

export interface DatabagFieldError {
  readonly path: string;
  readonly message: string;
}

export class DataValidationError extends DatabagError {
  readonly model: string;
  readonly errors: readonly DatabagFieldError[];
  readonly keys: readonly string[];

  constructor(
    model: string,
    message: string,
    errors: readonly DatabagFieldError[] = [],
    keys: readonly string[] = [],
  ) {
    super(`${model}: ${message}`);
    this.name = 'DataValidationError';
    this.model = model;
    this.errors = errors;
    this.keys = keys;
    Object.setPrototypeOf(this, DataValidationError.prototype);
  }

  public toErrorPlainObject() {
    return {
      ...super.toErrorPlainObject(),
      model: this.model,
      errors: this.errors,
      keys: this.keys,
    };
  }
}
