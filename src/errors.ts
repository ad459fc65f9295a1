export class CapabilityMissingError extends Error {
  override readonly name = 'CapabilityMissingError';

  constructor(
    readonly receiver: string,
    readonly method: string,
    message?: string,
  ) {
    super(message ?? `Method "${method}" is not available for ${receiver} values`);
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class InvalidOperatorError extends Error {
  override readonly name = 'InvalidOperatorError';

  constructor(readonly operator: string) {
    super(`Unknown logical operator "${operator}", expected "and" or "or"`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class TranslationError extends Error {
  override readonly name = 'TranslationError';

  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class QueryExecutionError extends Error {
  override readonly name = 'QueryExecutionError';

  constructor(
    message: string,
    override readonly cause?: unknown,
  ) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class MaterializationError extends Error {
  override readonly name = 'MaterializationError';

  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
