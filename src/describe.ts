// src/describe.ts
// Readable names for mana symbols, used for alt text and CLI output.

import { colorName, type Color } from './types/colors';
import type { ManaCost, ManaSymbol } from './types/symbols';

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}

function either(first: string, second: Color): string {
  return `${first} or ${colorName(second)}`;
}

export function describeManaSymbol(symbol: ManaSymbol): string {
  switch (symbol.type) {
    case 'generic':
      return `${symbol.amount} generic mana`;
    case 'variable':
      return `${symbol.name} generic mana`;
    case 'colorless':
      return 'Colorless mana';
    case 'snow':
      return 'Snow mana';
    case 'colored':
      return `${capitalize(colorName(symbol.color))} mana`;
    case 'phyrexian':
      return `Phyrexian ${colorName(symbol.color)} mana`;
    case 'hybrid':
      return `Hybrid mana: ${either(colorName(symbol.first), symbol.second)}`;
    case 'phyrexian-hybrid':
      return `Phyrexian hybrid mana: ${either(colorName(symbol.first), symbol.second)}`;
    case 'generic-hybrid':
      return `Hybrid mana: ${either(`${symbol.amount} generic`, symbol.color)}`;
    case 'colorless-hybrid':
      return `Hybrid mana: ${either('colorless', symbol.color)}`;
    default: {
      const unhandled: never = symbol;
      return unhandled;
    }
  }
}

export function describeManaCost(cost: ManaCost): string[] {
  return cost.map(describeManaSymbol);
}
