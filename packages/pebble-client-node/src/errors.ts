import type { Change } from './types.js';

export class PebbleError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PebbleError';
    Object.setPrototypeOf(this, PebbleError.prototype);
  }

  public toErrorPlainObject() {
    return {
      name: this.name,
      message: this.message,
      stack: this.stack,
    };
  }
}

export class PebbleConnectionError extends PebbleError {
  readonly cause?: unknown;

  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = 'PebbleConnectionError';
    this.cause = cause;
    Object.setPrototypeOf(this, PebbleConnectionError.prototype);
  }

  public toErrorPlainObject() {
    return {
      ...super.toErrorPlainObject(),
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
    };
  }
}

export class PebbleAPIError extends PebbleError {
  readonly statusCode: number;
  readonly status?: string;
  readonly kind?: string;

  constructor(message: string, statusCode: number, status?: string, kind?: string) {
    super(message);
    this.name = 'PebbleAPIError';
    this.statusCode = statusCode;
    this.status = status;
    this.kind = kind;
    Object.setPrototypeOf(this, PebbleAPIError.prototype);
  }

  public toErrorPlainObject() {
    return {
      ...super.toErrorPlainObject(),
      statusCode: this.statusCode,
      status: this.status,
      kind: this.kind,
    };
  }
}

export class PebbleProtocolError extends PebbleError {
  readonly errors: unknown[];

  constructor(message: string, errors: unknown[] = []) {
    super(message);
    this.name = 'PebbleProtocolError';
    this.errors = errors;
    Object.setPrototypeOf(this, PebbleProtocolError.prototype);
  }

  public toErrorPlainObject() {
    return {
      ...super.toErrorPlainObject(),
      errors: this.errors,
    };
  }
}

export class PebblePathError extends PebbleError {
  readonly kind: string;
  readonly path: string;

  constructor(kind: string, message: string, path: string) {
    super(`${kind} - ${message}`);
    this.name = 'PebblePathError';
    this.kind = kind;
    this.path = path;
    Object.setPrototypeOf(this, PebblePathError.prototype);
  }

  public toErrorPlainObject() {
    return {
      ...super.toErrorPlainObject(),
      kind: this.kind,
      path: this.path,
    };
  }
}

export class PebbleChangeError extends PebbleError {
  readonly err: string;
  readonly change: Change;

  constructor(err: string, change: Change) {
    super(err);
    this.name = 'PebbleChangeError';
    this.err = err;
    this.change = change;
    Object.setPrototypeOf(this, PebbleChangeError.prototype);
  }

  public toErrorPlainObject() {
    return {
      ...super.toErrorPlainObject(),
      changeId: this.change.id,
      changeKind: this.change.kind,
      changeStatus: this.change.status,
    };
  }
}
