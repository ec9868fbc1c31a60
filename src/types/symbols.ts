/**
 * Rule 107.4: Mana symbols
 * The closed set of symbols a mana cost is made of. Every symbol is a frozen
 * value; two symbols are the same symbol when their fields are equal.
 */

import { Color, colorLetter, orientColorPair, WUBRG } from './colors';
import { InvalidSymbolError } from '../errors';

// Rule 107.3 - X, Y and Z stand in for a number chosen later
export type VariableName = 'X' | 'Y' | 'Z';

export const VARIABLE_NAMES: readonly VariableName[] = ['X', 'Y', 'Z'] as const;

// Rule 107.4b - Numerical symbols are generic mana
export interface GenericSymbol {
  readonly type: 'generic';
  readonly amount: number;
}

export interface VariableSymbol {
  readonly type: 'variable';
  readonly name: VariableName;
}

// Rule 107.4c - {C} is one colorless mana
export interface ColorlessSymbol {
  readonly type: 'colorless';
}

// Rule 107.4a - {W}, {U}, {B}, {R}, {G}
export interface ColoredSymbol {
  readonly type: 'colored';
  readonly color: Color;
}

// Rule 107.4f - Payable with one mana of its color or 2 life
export interface PhyrexianSymbol {
  readonly type: 'phyrexian';
  readonly color: Color;
}

// Rule 107.4e - Payable with either of two colors
export interface HybridSymbol {
  readonly type: 'hybrid';
  readonly first: Color;
  readonly second: Color;
}

export interface PhyrexianHybridSymbol {
  readonly type: 'phyrexian-hybrid';
  readonly first: Color;
  readonly second: Color;
}

// Rule 107.4e - {2/W} and friends: the amount of generic mana, or one colored
export interface GenericHybridSymbol {
  readonly type: 'generic-hybrid';
  readonly amount: number;
  readonly color: Color;
}

export interface ColorlessHybridSymbol {
  readonly type: 'colorless-hybrid';
  readonly color: Color;
}

// Rule 107.4h - {S} is paid with mana from a snow source
export interface SnowSymbol {
  readonly type: 'snow';
}

export type ManaSymbol =
  | GenericSymbol
  | VariableSymbol
  | ColorlessSymbol
  | ColoredSymbol
  | PhyrexianSymbol
  | HybridSymbol
  | PhyrexianHybridSymbol
  | GenericHybridSymbol
  | ColorlessHybridSymbol
  | SnowSymbol;

export type ManaSymbolType = ManaSymbol['type'];

/**
 * Rule 202.1 - A mana cost is the sequence of symbols printed on a card.
 * Order matters until the cost is sorted.
 */
export type ManaCost = readonly ManaSymbol[];

function assertAmount(amount: number): void {
  if (!Number.isSafeInteger(amount) || amount < 0) {
    throw new InvalidSymbolError(`Generic amount must be a non-negative integer, got ${amount}`);
  }
}

function assertColor(color: Color): void {
  if (!WUBRG.includes(color)) {
    throw new InvalidSymbolError(`Unknown color '${String(color)}'`);
  }
}

function assertDistinct(first: Color, second: Color): void {
  assertColor(first);
  assertColor(second);
  if (first === second) {
    const letter = colorLetter(first);
    throw new InvalidSymbolError(`Hybrid symbol needs two different colors, got ${letter}/${letter}`);
  }
}

export function genericMana(amount: number): GenericSymbol {
  assertAmount(amount);
  return Object.freeze({ type: 'generic', amount });
}

export function variableMana(name: VariableName): VariableSymbol {
  if (!VARIABLE_NAMES.includes(name)) {
    throw new InvalidSymbolError(`Unknown variable '${String(name)}'`);
  }
  return Object.freeze({ type: 'variable', name });
}

const COLORLESS: ColorlessSymbol = Object.freeze({ type: 'colorless' });
const SNOW: SnowSymbol = Object.freeze({ type: 'snow' });

export function colorlessMana(): ColorlessSymbol {
  return COLORLESS;
}

export function snowMana(): SnowSymbol {
  return SNOW;
}

export function coloredMana(color: Color): ColoredSymbol {
  assertColor(color);
  return Object.freeze({ type: 'colored', color });
}

export function phyrexianMana(color: Color): PhyrexianSymbol {
  assertColor(color);
  return Object.freeze({ type: 'phyrexian', color });
}

/**
 * The pair is stored along the shorter arc of the wheel, so `hybridMana(U, W)`
 * and `hybridMana(W, U)` build the same `{W/U}` symbol.
 */
export function hybridMana(a: Color, b: Color): HybridSymbol {
  assertDistinct(a, b);
  const [first, second] = orientColorPair(a, b);
  return Object.freeze({ type: 'hybrid', first, second });
}

export function phyrexianHybridMana(a: Color, b: Color): PhyrexianHybridSymbol {
  assertDistinct(a, b);
  const [first, second] = orientColorPair(a, b);
  return Object.freeze({ type: 'phyrexian-hybrid', first, second });
}

export function genericHybridMana(amount: number, color: Color): GenericHybridSymbol {
  assertAmount(amount);
  assertColor(color);
  return Object.freeze({ type: 'generic-hybrid', amount, color });
}

export function colorlessHybridMana(color: Color): ColorlessHybridSymbol {
  assertColor(color);
  return Object.freeze({ type: 'colorless-hybrid', color });
}

export function manaCost(...symbols: ManaSymbol[]): ManaCost {
  return Object.freeze(symbols);
}

/**
 * Color on the left half of a split symbol, or the only color of a
 * monocolored one. Generic-hybrid and colorless-hybrid symbols have no
 * colored left half.
 */
export function leftHalfColor(symbol: ManaSymbol): Color | undefined {
  switch (symbol.type) {
    case 'colored':
    case 'phyrexian':
      return symbol.color;
    case 'hybrid':
    case 'phyrexian-hybrid':
      return symbol.first;
    case 'generic':
    case 'variable':
    case 'colorless':
    case 'generic-hybrid':
    case 'colorless-hybrid':
    case 'snow':
      return undefined;
    default: {
      const unhandled: never = symbol;
      return unhandled;
    }
  }
}

export function rightHalfColor(symbol: ManaSymbol): Color | undefined {
  switch (symbol.type) {
    case 'colored':
    case 'phyrexian':
    case 'generic-hybrid':
    case 'colorless-hybrid':
      return symbol.color;
    case 'hybrid':
    case 'phyrexian-hybrid':
      return symbol.second;
    case 'generic':
    case 'variable':
    case 'colorless':
    case 'snow':
      return undefined;
    default: {
      const unhandled: never = symbol;
      return unhandled;
    }
  }
}

// Colors a symbol can be paid with, left half first
export function symbolColors(symbol: ManaSymbol): Color[] {
  const left = leftHalfColor(symbol);
  const right = rightHalfColor(symbol);
  const colors: Color[] = [];
  if (left !== undefined) colors.push(left);
  if (right !== undefined && right !== left) colors.push(right);
  return colors;
}

export function isSameSymbol(a: ManaSymbol, b: ManaSymbol): boolean {
  switch (a.type) {
    case 'generic':
      return b.type === 'generic' && a.amount === b.amount;
    case 'variable':
      return b.type === 'variable' && a.name === b.name;
    case 'colorless':
    case 'snow':
      return a.type === b.type;
    case 'colored':
      return b.type === 'colored' && a.color === b.color;
    case 'phyrexian':
      return b.type === 'phyrexian' && a.color === b.color;
    case 'hybrid':
      return b.type === 'hybrid' && a.first === b.first && a.second === b.second;
    case 'phyrexian-hybrid':
      return b.type === 'phyrexian-hybrid' && a.first === b.first && a.second === b.second;
    case 'generic-hybrid':
      return b.type === 'generic-hybrid' && a.amount === b.amount && a.color === b.color;
    case 'colorless-hybrid':
      return b.type === 'colorless-hybrid' && a.color === b.color;
    default: {
      const unhandled: never = a;
      return unhandled;
    }
  }
}
