/**
 * Error classes thrown by the walker.
 *
 * Errors raised by a visitor are never wrapped: they reach the caller of
 * `walk` unchanged.
 */

/**
 * Reading an object field threw, under `fieldReadFailure: 'throw'`.
 * The original error is kept as `cause`.
 */
export class FieldReadError extends Error {
  public readonly memberName: string;

  constructor(memberName: string, cause: unknown) {
    super(`Failed to read field "${memberName}".`, { cause });
    this.name = 'FieldReadError';
    this.memberName = memberName;
  }
}

/**
 * Invoking an accessor threw, under `accessorFailure: 'throw'`.
 */
export class AccessorInvocationError extends Error {
  public readonly memberName: string;

  constructor(memberName: string, cause: unknown) {
    super(`Failed to invoke accessor "${memberName}".`, { cause });
    this.name = 'AccessorInvocationError';
    this.memberName = memberName;
  }
}

/**
 * `walk` was called on a walker whose previous walk has not returned yet
 * (typically a visitor calling back into its own walker).
 */
export class WalkerBusyError extends Error {
  constructor() {
    super(
      'The walker is already walking a value. Use a separate walker for nested walks.'
    );
    this.name = 'WalkerBusyError';
  }
}
