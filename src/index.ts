/**
 * Mana cost symbols
 * Parsing, canonical ordering and mana value of Magic: The Gathering mana costs
 *
 * All functions are side-effect free and operate on immutable inputs.
 * The short names (parse, sort, compare, render) are aliases of the
 * descriptive exports below.
 */

// =============================================================================
// TYPE EXPORTS
// =============================================================================
export * from './types';

export {
  ManaCostError,
  InvalidSymbolError,
  ParseError,
  formatDiagnostic,
  spanAt
} from './errors';
export type { ParseErrorKind, SourceSpan } from './errors';

// =============================================================================
// PARSING
// =============================================================================
export {
  parseManaCost,
  parseManaCostOrThrow,
  parseManaSymbol,
  parseManaCost as parse,
  parseManaCostOrThrow as parseOrThrow
} from './parser';
export type { ParseResult } from './parser';

// =============================================================================
// ORDERING
// =============================================================================
export {
  SymbolBucket,
  symbolBucket,
  symbolSortKey,
  compareManaSymbols,
  sortManaCost,
  isSortedManaCost,
  compareManaSymbols as compare,
  sortManaCost as sort
} from './comparator';
export type { Ordering } from './comparator';

// =============================================================================
// MANA VALUE, RENDERING, DESCRIPTIONS
// =============================================================================
export { manaValue, symbolManaValue } from './manaValue';
export { render, renderManaCost, renderManaSymbol, symbolBody } from './render';
export { describeManaSymbol, describeManaCost } from './describe';
