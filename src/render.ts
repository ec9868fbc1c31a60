// src/render.ts
// Canonical text form of symbols and costs, the inverse of the parser.

import { colorLetter } from './types/colors';
import type { ManaCost, ManaSymbol } from './types/symbols';

/**
 * Text between the braces, e.g. `R/G/P` for a red/green phyrexian hybrid
 */
export function symbolBody(symbol: ManaSymbol): string {
  switch (symbol.type) {
    case 'generic':
      return String(symbol.amount);
    case 'variable':
      return symbol.name;
    case 'colorless':
      return 'C';
    case 'snow':
      return 'S';
    case 'colored':
      return colorLetter(symbol.color);
    case 'phyrexian':
      return `${colorLetter(symbol.color)}/P`;
    case 'hybrid':
      return `${colorLetter(symbol.first)}/${colorLetter(symbol.second)}`;
    case 'phyrexian-hybrid':
      return `${colorLetter(symbol.first)}/${colorLetter(symbol.second)}/P`;
    case 'generic-hybrid':
      return `${symbol.amount}/${colorLetter(symbol.color)}`;
    case 'colorless-hybrid':
      return `C/${colorLetter(symbol.color)}`;
    default: {
      const unhandled: never = symbol;
      return unhandled;
    }
  }
}

export function renderManaSymbol(symbol: ManaSymbol): string {
  return `{${symbolBody(symbol)}}`;
}

export function renderManaCost(cost: ManaCost): string {
  return cost.map(renderManaSymbol).join('');
}

function isManaCost(value: ManaSymbol | ManaCost): value is ManaCost {
  return Array.isArray(value);
}

/**
 * Canonical form of a single symbol or of a whole cost, e.g. `{5}{C}{U}{R/G/P}{S}`
 */
export function render(value: ManaSymbol | ManaCost): string {
  return isManaCost(value) ? renderManaCost(value) : renderManaSymbol(value);
}
