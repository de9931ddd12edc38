/**
 * netvent parse/encode/type errors with line/column location.
 */

export interface SourcePosition {
  line: number;
  column: number;
  offset: number;
}

export const ParseErrorCode = {
  EmptyInput: 'EMPTY_INPUT',
  MalformedStructure: 'MALFORMED_STRUCTURE',
  MissingSeparator: 'MISSING_SEPARATOR',
  InputTooLong: 'INPUT_TOO_LONG',
  DepthExceeded: 'DEPTH_EXCEEDED',
} as const;

export type ParseErrorCode = (typeof ParseErrorCode)[keyof typeof ParseErrorCode];

type ConstructorOptions = { position?: SourcePosition; cause?: unknown };

export class NetventError extends Error {
  override readonly name: string = 'NetventError';
  readonly position?: SourcePosition;

  constructor(message: string, options?: ConstructorOptions) {
    super(message);
    this.position = options?.position;
    if (options?.cause !== undefined) this.cause = options.cause;
    Object.setPrototypeOf(this, NetventError.prototype);
  }

  /** Human-readable location string */
  get location(): string {
    if (this.position) {
      return `line ${this.position.line}, column ${this.position.column}`;
    }
    return '';
  }

  override toString(): string {
    const loc = this.location;
    return loc ? `${this.message} (${loc})` : this.message;
  }
}

export class NetventParseError extends NetventError {
  override readonly name = 'NetventParseError';
  readonly code: ParseErrorCode;

  constructor(message: string, code: ParseErrorCode, options?: ConstructorOptions) {
    super(message, options);
    this.code = code;
    Object.setPrototypeOf(this, NetventParseError.prototype);
  }
}

export class NetventEncodeError extends NetventError {
  override readonly name = 'NetventEncodeError';
  constructor(message: string, options?: ConstructorOptions) {
    super(message, options);
    Object.setPrototypeOf(this, NetventEncodeError.prototype);
  }
}

/** Thrown when a value is read or built as the wrong kind. */
export class NetventTypeError extends NetventError {
  override readonly name = 'NetventTypeError';
  constructor(message: string, options?: ConstructorOptions) {
    super(message, options);
    Object.setPrototypeOf(this, NetventTypeError.prototype);
  }
}
