/**
 * Mana symbol ordering
 *
 * Symbols are grouped into buckets, in display order:
 *   colorless -> colored -> hybrid -> generic -> snow
 *
 * Within a bucket:
 * - colored: WUBRG, each plain symbol directly before its phyrexian version
 * - hybrid: generic hybrids (by color, then amount), colorless hybrids
 *   (by color), then two-color hybrids by their first color, adjacent pairs
 *   before pairs two steps apart, plain before phyrexian
 * - generic: X, Y, Z, then amounts ascending
 *
 * Two symbols compare equal only when they are the same symbol, so sorting
 * never needs to break ties beyond keeping the input order.
 */

import { colorIndex, wheelDistance } from './types/colors';
import type { ManaCost, ManaSymbol } from './types/symbols';

export type Ordering = -1 | 0 | 1;

export enum SymbolBucket {
  COLORLESS = 0,
  COLORED = 1,
  HYBRID = 2,
  GENERIC = 3,
  SNOW = 4
}

// Tiers inside the hybrid bucket
const GENERIC_HYBRID_TIER = 0;
const COLORLESS_HYBRID_TIER = 1;
const TWO_COLOR_HYBRID_TIER = 2;

// Tiers inside the generic bucket
const VARIABLE_TIER = 0;
const AMOUNT_TIER = 1;

const VARIABLE_ORDER = { X: 0, Y: 1, Z: 2 } as const;

export function symbolBucket(symbol: ManaSymbol): SymbolBucket {
  switch (symbol.type) {
    case 'colorless':
      return SymbolBucket.COLORLESS;
    case 'colored':
    case 'phyrexian':
      return SymbolBucket.COLORED;
    case 'hybrid':
    case 'phyrexian-hybrid':
    case 'generic-hybrid':
    case 'colorless-hybrid':
      return SymbolBucket.HYBRID;
    case 'generic':
    case 'variable':
      return SymbolBucket.GENERIC;
    case 'snow':
      return SymbolBucket.SNOW;
    default: {
      const unhandled: never = symbol;
      return unhandled;
    }
  }
}

/**
 * Sort key for a symbol. Keys of symbols in the same bucket and tier have the
 * same length, so comparing them element by element is enough.
 */
export function symbolSortKey(symbol: ManaSymbol): readonly number[] {
  const bucket = symbolBucket(symbol);

  switch (symbol.type) {
    case 'colorless':
    case 'snow':
      return [bucket];
    case 'colored':
      return [bucket, colorIndex(symbol.color), 0];
    case 'phyrexian':
      return [bucket, colorIndex(symbol.color), 1];
    case 'generic-hybrid':
      return [bucket, GENERIC_HYBRID_TIER, colorIndex(symbol.color), symbol.amount];
    case 'colorless-hybrid':
      return [bucket, COLORLESS_HYBRID_TIER, colorIndex(symbol.color)];
    case 'hybrid':
      return [bucket, TWO_COLOR_HYBRID_TIER, colorIndex(symbol.first), wheelDistance(symbol.first, symbol.second), 0];
    case 'phyrexian-hybrid':
      return [bucket, TWO_COLOR_HYBRID_TIER, colorIndex(symbol.first), wheelDistance(symbol.first, symbol.second), 1];
    case 'variable':
      return [bucket, VARIABLE_TIER, VARIABLE_ORDER[symbol.name]];
    case 'generic':
      return [bucket, AMOUNT_TIER, symbol.amount];
    default: {
      const unhandled: never = symbol;
      return unhandled;
    }
  }
}

/**
 * Total order over mana symbols. Returns 0 only for identical symbols.
 */
export function compareManaSymbols(a: ManaSymbol, b: ManaSymbol): Ordering {
  const keyA = symbolSortKey(a);
  const keyB = symbolSortKey(b);
  const length = Math.min(keyA.length, keyB.length);

  for (let i = 0; i < length; i++) {
    if (keyA[i] !== keyB[i]) {
      return keyA[i] < keyB[i] ? -1 : 1;
    }
  }

  if (keyA.length === keyB.length) return 0;
  return keyA.length < keyB.length ? -1 : 1;
}

/**
 * Sorted copy of a cost. Array.prototype.sort is stable, so repeated symbols
 * keep their relative order.
 */
export function sortManaCost(cost: ManaCost): ManaCost {
  return Object.freeze([...cost].sort(compareManaSymbols));
}

export function isSortedManaCost(cost: ManaCost): boolean {
  for (let i = 1; i < cost.length; i++) {
    if (compareManaSymbols(cost[i - 1], cost[i]) > 0) return false;
  }
  return true;
}
