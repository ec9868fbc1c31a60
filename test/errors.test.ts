/**
 * Tests for error types and diagnostics
 */
import { describe, it, expect } from 'vitest';
import {
  InvalidSymbolError,
  ManaCostError,
  ParseError,
  formatDiagnostic,
  spanAt
} from '../src/errors';
import { parseManaCost } from '../src/parser';

describe('Errors', () => {
  it('should measure spans in characters and UTF-8 bytes', () => {
    expect(spanAt('é{U}', 1, 3)).toEqual({ text: '{U}', offset: 1, byteOffset: 2, length: 3 });
    expect(spanAt('{U}', 0, 3)).toEqual({ text: '{U}', offset: 0, byteOffset: 0, length: 3 });
  });

  it('should name errors after their class', () => {
    const error = new ParseError('empty-symbol', spanAt('{}', 0, 2));
    expect(error.name).toBe('ParseError');
    expect(error).toBeInstanceOf(ManaCostError);
    expect(error.message).toBe("Empty mana symbol '{}' at offset 0");
  });

  it('should attach a span to an invalid symbol error', () => {
    const error = new InvalidSymbolError('Bad symbol').withSpan(spanAt('{1}{W/W}', 3, 5));
    expect(error.reason).toBe('Bad symbol');
    expect(error.message).toBe('Bad symbol at offset 3');
    expect(error.span?.text).toBe('{W/W}');
  });

  it('should underline the failing span', () => {
    const result = parseManaCost('{U}{U');
    if (result.ok) throw new Error('expected a parse failure');

    expect(formatDiagnostic('{U}{U', result.error)).toBe(
      "Unmatched brace '{U' at offset 3\n  {U}{U\n     ^^"
    );
  });

  it('should fall back to the message without a span', () => {
    expect(formatDiagnostic('', new InvalidSymbolError('Bad symbol'))).toBe('Bad symbol');
  });
});
