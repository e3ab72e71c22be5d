export class KineticsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'KineticsError';
  }
}

export type ParseErrorKind =
  | 'InvalidNumber'
  | 'NegativeTime'
  | 'ColumnCount'
  | 'ColumnMismatch'
  | 'MalformedText';

export class ParseError extends KineticsError {
  readonly kind: ParseErrorKind;
  readonly row?: number; // 0-based index of the offending data row
  readonly raw?: string;

  constructor(kind: ParseErrorKind, message: string, row?: number, raw?: string) {
    super(message);
    this.name = 'ParseError';
    this.kind = kind;
    this.row = row;
    this.raw = raw;
  }
}

export class InsufficientDataError extends KineticsError {
  readonly sampleCount: number;

  constructor(sampleCount: number) {
    super(`At least 2 data points are needed to fit a rate law (got ${sampleCount}).`);
    this.name = 'InsufficientDataError';
    this.sampleCount = sampleCount;
  }
}

// Invalid arguments to the two-point calculator
export class KineticsInputError extends KineticsError {
  constructor(message: string) {
    super(message);
    this.name = 'KineticsInputError';
  }
}
