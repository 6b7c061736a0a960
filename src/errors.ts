export class InvalidOperatorError extends Error {
  override readonly name = 'InvalidOperatorError';

  constructor(
    readonly operator: string,
    message?: string,
  ) {
    super(message ?? `Invalid operator ${JSON.stringify(operator)}: expected one of ==, >, >=, <, <=`);
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class StoreError extends Error {
  override readonly name = 'StoreError';

  constructor(
    message: string,
    override readonly cause?: unknown,
  ) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class JobTimeoutError extends Error {
  override readonly name = 'JobTimeoutError';

  constructor(readonly timeoutMs: number) {
    super(`Computation job exceeded its timeout of ${timeoutMs}ms`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
