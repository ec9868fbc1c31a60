// src/parser.ts
// Mana cost text -> symbols. Hand-written scanner over `{...}` tokens.

import { colorFromLetter } from './types/colors';
import {
  colorlessHybridMana,
  colorlessMana,
  coloredMana,
  genericHybridMana,
  genericMana,
  hybridMana,
  phyrexianHybridMana,
  phyrexianMana,
  snowMana,
  variableMana,
  type ManaCost,
  type ManaSymbol,
  type VariableName
} from './types/symbols';
import { InvalidSymbolError, ParseError, spanAt } from './errors';
import { debug } from './utils/debug';

export type ParseResult =
  | { readonly ok: true; readonly cost: ManaCost }
  | { readonly ok: false; readonly error: ParseError | InvalidSymbolError };

interface Token {
  /** Text between the braces */
  readonly body: string;
  /** Offset of the opening brace (or of the body for bare symbols) */
  readonly offset: number;
  readonly length: number;
}

const DIGITS = /^[0-9]+$/;
const SYMBOL_BODY = /^[0-9A-Za-z/]*$/;
const WHITESPACE = /\s/;

/**
 * Parse a mana cost such as `{5}{U}{U/B}` into its symbols, in source order.
 *
 * Letters are case-insensitive and whitespace between symbols is ignored.
 * Any other text outside braces, an unclosed or stray brace, an empty `{}`
 * or an unknown symbol fails the whole parse. Empty input is the empty cost.
 */
export function parseManaCost(text: string): ParseResult {
  try {
    return { ok: true, cost: parseManaCostOrThrow(text) };
  } catch (error) {
    if (error instanceof ParseError || error instanceof InvalidSymbolError) {
      return { ok: false, error };
    }
    throw error;
  }
}

/**
 * Same as parseManaCost, but throws the ParseError or InvalidSymbolError.
 */
export function parseManaCostOrThrow(text: string): ManaCost {
  const symbols: ManaSymbol[] = [];

  for (const token of scanTokens(text)) {
    symbols.push(toSymbol(token, text));
  }

  debug(2, `[parser] parsed ${symbols.length} symbol(s) from '${text}'`);
  return Object.freeze(symbols);
}

/**
 * Parse exactly one symbol, written with braces (`{U/B}`) or without (`U/B`).
 */
export function parseManaSymbol(text: string): ManaSymbol {
  if (!text.startsWith('{')) {
    return toSymbol({ body: text, offset: 0, length: text.length }, text);
  }

  const tokens = scanTokens(text);
  const first = tokens.next();
  if (first.done) {
    throw new ParseError('empty-symbol', spanAt(text, 0, text.length));
  }
  const symbol = toSymbol(first.value, text);

  const extra = tokens.next();
  if (!extra.done) {
    const offset = extra.value.offset;
    throw new ParseError('unexpected-character', spanAt(text, offset, text.length - offset));
  }
  return symbol;
}

function* scanTokens(text: string): Generator<Token, void, undefined> {
  let pos = 0;

  while (pos < text.length) {
    const ch = text[pos];

    if (WHITESPACE.test(ch)) {
      pos++;
      continue;
    }

    if (ch === '}') {
      throw new ParseError('unmatched-brace', spanAt(text, pos, 1));
    }

    if (ch !== '{') {
      const width = (text.codePointAt(pos) ?? 0) > 0xffff ? 2 : 1;
      throw new ParseError('unexpected-character', spanAt(text, pos, width));
    }

    let close = pos + 1;
    while (close < text.length && text[close] !== '}' && text[close] !== '{') {
      close++;
    }

    if (close === text.length || text[close] === '{') {
      throw new ParseError('unmatched-brace', spanAt(text, pos, close - pos));
    }

    const token: Token = { body: text.slice(pos + 1, close), offset: pos, length: close - pos + 1 };
    debug(2, `[parser] token '${token.body}' at ${token.offset}`);
    yield token;
    pos = close + 1;
  }
}

function toSymbol(token: Token, text: string): ManaSymbol {
  const span = spanAt(text, token.offset, token.length);

  if (token.body === '') {
    throw new ParseError('empty-symbol', span);
  }

  let symbol: ManaSymbol | undefined;
  try {
    symbol = interpretBody(token.body);
  } catch (error) {
    if (error instanceof InvalidSymbolError) {
      throw error.withSpan(span);
    }
    throw error;
  }

  if (!symbol) {
    throw new ParseError('unrecognized-symbol', span);
  }
  return symbol;
}

function interpretBody(body: string): ManaSymbol | undefined {
  if (!SYMBOL_BODY.test(body)) {
    return undefined;
  }

  const parts = body.toUpperCase().split('/');
  switch (parts.length) {
    case 1:
      return interpretSingle(parts[0]);
    case 2:
      return interpretPair(parts[0], parts[1]);
    case 3:
      return interpretTriple(parts[0], parts[1], parts[2]);
    default:
      return undefined;
  }
}

function interpretSingle(part: string): ManaSymbol | undefined {
  if (DIGITS.test(part)) {
    return genericMana(Number(part));
  }
  if (isVariableName(part)) {
    return variableMana(part);
  }
  if (part === 'C') {
    return colorlessMana();
  }
  if (part === 'S') {
    return snowMana();
  }
  const color = colorFromLetter(part);
  return color ? coloredMana(color) : undefined;
}

function interpretPair(left: string, right: string): ManaSymbol | undefined {
  const rightColor = colorFromLetter(right);
  const leftColor = colorFromLetter(left);

  if (rightColor && DIGITS.test(left)) {
    return genericHybridMana(Number(left), rightColor);
  }
  if (rightColor && left === 'C') {
    return colorlessHybridMana(rightColor);
  }
  if (leftColor && right === 'P') {
    return phyrexianMana(leftColor);
  }
  if (leftColor && rightColor) {
    return hybridMana(leftColor, rightColor);
  }
  return undefined;
}

function interpretTriple(left: string, right: string, marker: string): ManaSymbol | undefined {
  const leftColor = colorFromLetter(left);
  const rightColor = colorFromLetter(right);

  if (leftColor && rightColor && marker === 'P') {
    return phyrexianHybridMana(leftColor, rightColor);
  }
  return undefined;
}

function isVariableName(part: string): part is VariableName {
  return part === 'X' || part === 'Y' || part === 'Z';
}
