export class WorkerOperatorError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'WorkerOperatorError';
    Object.setPrototypeOf(this, WorkerOperatorError.prototype);
  }

  public toErrorPlainObject() {
    return {
      name: this.name,
      message: this.message,
      stack: this.stack,
    };
  }
}

export class InvalidAddressError extends WorkerOperatorError {
  readonly address: string;

  constructor(address: string) {
    super(`${address} is an invalid url`);
    this.name = 'InvalidAddressError';
    this.address = address;
    Object.setPrototypeOf(this, InvalidAddressError.prototype);
  }

  public toErrorPlainObject() {
    return {
      ...super.toErrorPlainObject(),
      address: this.address,
    };
  }
}

/** A non-leader unit tried to write application-scoped relation data. */
export class DatabagAccessPermissionError extends WorkerOperatorError {
  constructor(message: string) {
    super(message);
    this.name = 'DatabagAccessPermissionError';
    Object.setPrototypeOf(this, DatabagAccessPermissionError.prototype);
  }
}

export class CertificateUnavailableError extends WorkerOperatorError {
  readonly cause?: unknown;

  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = 'CertificateUnavailableError';
    this.cause = cause;
    Object.setPrototypeOf(this, CertificateUnavailableError.prototype);
  }

  public toErrorPlainObject() {
    return {
      ...super.toErrorPlainObject(),
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
    };
  }
}

export class SupervisionError extends WorkerOperatorError {
  readonly service: string;
  readonly action: string;

  constructor(service: string, action: string, message: string) {
    super(`failed to ${action} ${service}: ${message}`);
    this.name = 'SupervisionError';
    this.service = service;
    this.action = action;
    Object.setPrototypeOf(this, SupervisionError.prototype);
  }

  public toErrorPlainObject() {
    return {
      ...super.toErrorPlainObject(),
      service: this.service,
      action: this.action,
    };
  }
}

export class WorkloadConnectionError extends WorkerOperatorError {
  constructor(message: string) {
    super(message);
    this.name = 'WorkloadConnectionError';
    Object.setPrototypeOf(this, WorkloadConnectionError.prototype);
  }
}

export class WorkloadPathError extends WorkerOperatorError {
  readonly kind: string;
  readonly path: string;

  constructor(kind: string, path: string, message: string) {
    super(message);
    this.name = 'WorkloadPathError';
    this.kind = kind;
    this.path = path;
    Object.setPrototypeOf(this, WorkloadPathError.prototype);
  }

  public toErrorPlainObject() {
    return {
      ...super.toErrorPlainObject(),
      kind: this.kind,
      path: this.path,
    };
  }
}

export class HookToolError extends WorkerOperatorError {
  readonly tool: string;
  readonly args: readonly string[];
  readonly stderr: string;

  constructor(tool: string, args: readonly string[], stderr: string) {
    super(`${tool} failed: ${stderr.trim() || 'no output'}`);
    this.name = 'HookToolError';
    this.tool = tool;
    this.args = args;
    this.stderr = stderr;
    Object.setPrototypeOf(this, HookToolError.prototype);
  }

  public toErrorPlainObject() {
    return {
      ...super.toErrorPlainObject(),
      tool: this.tool,
      args: this.args,
    };
  }
}
