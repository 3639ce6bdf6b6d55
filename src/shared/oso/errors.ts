// Parse failure classification. Messages carry the technical detail only;
// presenting them to a user is up to the caller.

export type ParseErrorKind =
  | 'MalformedToken'
  | 'UnknownType'
  | 'InvalidArraySize'
  | 'ArityMismatch'
  | 'TypeMismatch'
  | 'UnexpectedDeclaration'
  | 'DuplicateParameterName'
  | 'UnexpectedEndOfInput';

/** The first structural or type error found in an OSO source */
export class OsoParseError extends Error {
  readonly kind: ParseErrorKind;
  /** 1-based source line */
  readonly line: number;
  readonly detail: string;

  constructor(kind: ParseErrorKind, line: number, detail: string) {
    super(detail);
    this.name = 'OsoParseError';
    this.kind = kind;
    this.line = line;
    this.detail = detail;
  }
}

/** Index-keyed parameter lookup past the end of the parameter list */
export class IndexOutOfRangeError extends RangeError {
  readonly index: number;
  readonly count: number;

  constructor(index: number, count: number) {
    super(`Parameter index ${index} out of range (${count} parameters)`);
    this.name = 'IndexOutOfRangeError';
    this.index = index;
    this.count = count;
  }
}

export function isOsoParseError(err: unknown): err is OsoParseError {
  return err instanceof OsoParseError;
}
