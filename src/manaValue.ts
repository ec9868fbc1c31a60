/**
 * Rule 202.3: Mana value
 * The mana value of a cost is the total amount of mana in it, without
 * regard to color.
 */

import type { ManaCost, ManaSymbol } from './types/symbols';

/**
 * Contribution of one symbol to mana value.
 * - Generic amounts count their number; X, Y and Z count as 0 (Rule 202.3e)
 * - A generic hybrid counts its printed number (Rule 202.3f)
 * - Every other symbol, phyrexian and snow included, counts as 1
 */
export function symbolManaValue(symbol: ManaSymbol): number {
  switch (symbol.type) {
    case 'generic':
    case 'generic-hybrid':
      return symbol.amount;
    case 'variable':
      return 0;
    case 'colorless':
    case 'colored':
    case 'phyrexian':
    case 'hybrid':
    case 'phyrexian-hybrid':
    case 'colorless-hybrid':
    case 'snow':
      return 1;
    default: {
      const unhandled: never = symbol;
      return unhandled;
    }
  }
}

export function manaValue(cost: ManaCost): number {
  return cost.reduce((total, symbol) => total + symbolManaValue(symbol), 0);
}
