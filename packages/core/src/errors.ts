/**
 * Error types raised by the query and index layers.
 *
 * Every error carries a stable `code` so callers can branch without
 * matching on message text. Messages themselves are stable too, since
 * derived-query validation asserts on them.
 *
 * @module errors
 */

export type AeroQueryErrorCode =
  | 'E_CTX_SYNTAX'
  | 'E_QUALIFIER_ARITY'
  | 'E_QUALIFIER'
  | 'E_UNSUPPORTED'
  | 'E_SCANS_DISABLED'
  | 'E_CONFIG'
  | 'E_INDEX'
  | 'E_STORE';

export abstract class AeroQueryError extends Error {
  abstract readonly code: AeroQueryErrorCode;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * Thrown by the context path parser for malformed annotation strings.
 */
export class InvalidContextSyntaxError extends AeroQueryError {
  public readonly name = 'InvalidContextSyntaxError';
  readonly code = 'E_CTX_SYNTAX';
}

/**
 * Wrong number of operands for a filter operation, e.g.
 * `Person.ints BETWEEN: invalid number of arguments, expecting two`.
 */
export class InvalidQualifierArityError extends AeroQueryError {
  public readonly name = 'InvalidQualifierArityError';
  readonly code = 'E_QUALIFIER_ARITY';
}

export class InvalidQualifierError extends AeroQueryError {
  public readonly name = 'InvalidQualifierError';
  readonly code = 'E_QUALIFIER';
}

export class UnsupportedQualifierError extends AeroQueryError {
  public readonly name = 'UnsupportedQualifierError';
  readonly code = 'E_UNSUPPORTED';
}

export const SCANS_DISABLED_MESSAGE =
  'Query without a filter will initiate a scan. Since scans are potentially dangerous operations, ' +
  'they are disabled by default. If you still need to use them, enable them via the ' +
  '`scansEnabled` setting or pass `scansEnabled: true` for a single call.';

export class ScansDisabledError extends AeroQueryError {
  public readonly name = 'ScansDisabledError';
  readonly code = 'E_SCANS_DISABLED';

  constructor() {
    super(SCANS_DISABLED_MESSAGE);
  }
}

export class ConfigurationError extends AeroQueryError {
  public readonly name = 'ConfigurationError';
  readonly code = 'E_CONFIG';
}

/**
 * Create/drop index failure that does not match the requested end state.
 */
export class IndexOperationError extends AeroQueryError {
  public readonly name = 'IndexOperationError';
  readonly code = 'E_INDEX';

  constructor(
    message: string,
    public readonly indexName: string,
    options?: ErrorOptions
  ) {
    super(message, options);
  }
}

/**
 * Error reported by a store client. `resultCode` is the server result code
 * (see `ResultCode` in store/StoreClient).
 */
export class StoreError extends AeroQueryError {
  public readonly name = 'StoreError';
  readonly code = 'E_STORE';

  constructor(
    public readonly resultCode: number,
    message: string,
    options?: ErrorOptions
  ) {
    super(message, options);
  }
}
