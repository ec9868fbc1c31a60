/**
 * Error types raised by symbol construction and by the parser.
 */

/**
 * Where in the parsed text a failure happened. `offset` indexes the
 * JavaScript string, `byteOffset` counts UTF-8 bytes up to the same point.
 */
export interface SourceSpan {
  readonly text: string;
  readonly offset: number;
  readonly byteOffset: number;
  readonly length: number;
}

export type ParseErrorKind =
  | 'unmatched-brace'
  | 'empty-symbol'
  | 'unrecognized-symbol'
  | 'unexpected-character';

export class ManaCostError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * A symbol was built with values that break its invariants, e.g. a negative
 * generic amount or a hybrid of one color with itself.
 */
export class InvalidSymbolError extends ManaCostError {
  readonly reason: string;
  readonly span?: SourceSpan;

  constructor(reason: string, span?: SourceSpan) {
    super(span ? `${reason} at offset ${span.offset}` : reason);
    this.reason = reason;
    this.span = span;
  }

  withSpan(span: SourceSpan): InvalidSymbolError {
    return new InvalidSymbolError(this.reason, span);
  }
}

/**
 * The input does not follow the `{...}{...}` token grammar.
 */
export class ParseError extends ManaCostError {
  readonly kind: ParseErrorKind;
  readonly span: SourceSpan;

  constructor(kind: ParseErrorKind, span: SourceSpan) {
    super(`${describeKind(kind)} '${span.text}' at offset ${span.offset}`);
    this.kind = kind;
    this.span = span;
  }

  get text(): string {
    return this.span.text;
  }

  get offset(): number {
    return this.span.offset;
  }

  get byteOffset(): number {
    return this.span.byteOffset;
  }
}

function describeKind(kind: ParseErrorKind): string {
  switch (kind) {
    case 'unmatched-brace':
      return 'Unmatched brace';
    case 'empty-symbol':
      return 'Empty mana symbol';
    case 'unrecognized-symbol':
      return 'Unrecognized mana symbol';
    case 'unexpected-character':
      return 'Unexpected character';
    default: {
      const unhandled: never = kind;
      return String(unhandled);
    }
  }
}

const encoder = new TextEncoder();

/**
 * Build a span for `length` characters of `input` starting at `offset`.
 */
export function spanAt(input: string, offset: number, length: number): SourceSpan {
  return {
    text: input.slice(offset, offset + length),
    offset,
    byteOffset: encoder.encode(input.slice(0, offset)).length,
    length
  };
}

/**
 * Two-line diagnostic: the input, then a caret run under the failing span.
 */
export function formatDiagnostic(input: string, error: ParseError | InvalidSymbolError): string {
  const span = error.span;
  if (!span) {
    return error.message;
  }
  const underline = ' '.repeat(span.offset) + '^'.repeat(Math.max(1, span.length));
  return `${error.message}\n  ${input}\n  ${underline}`;
}
