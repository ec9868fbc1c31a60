/**
 * Tests for Rule 107.4: Mana symbols
 */
import { describe, it, expect } from 'vitest';
import { Color } from '../src/types/colors';
import {
  genericMana,
  variableMana,
  colorlessMana,
  coloredMana,
  phyrexianMana,
  hybridMana,
  phyrexianHybridMana,
  genericHybridMana,
  colorlessHybridMana,
  snowMana,
  manaCost,
  leftHalfColor,
  rightHalfColor,
  symbolColors,
  isSameSymbol
} from '../src/types/symbols';
import { InvalidSymbolError, ManaCostError } from '../src/errors';

const { WHITE, BLUE, BLACK, RED, GREEN } = Color;

describe('Rule 107.4: Mana symbols', () => {
  describe('Construction', () => {
    it('should build frozen values', () => {
      const five = genericMana(5);
      expect(five).toEqual({ type: 'generic', amount: 5 });
      expect(Object.isFrozen(five)).toBe(true);
      expect(Object.isFrozen(hybridMana(RED, GREEN))).toBe(true);
    });

    it('should build every variant', () => {
      expect(variableMana('X')).toEqual({ type: 'variable', name: 'X' });
      expect(colorlessMana()).toEqual({ type: 'colorless' });
      expect(coloredMana(BLUE)).toEqual({ type: 'colored', color: BLUE });
      expect(phyrexianMana(BLACK)).toEqual({ type: 'phyrexian', color: BLACK });
      expect(genericHybridMana(2, WHITE)).toEqual({ type: 'generic-hybrid', amount: 2, color: WHITE });
      expect(colorlessHybridMana(BLUE)).toEqual({ type: 'colorless-hybrid', color: BLUE });
      expect(snowMana()).toEqual({ type: 'snow' });
    });

    it('should accept zero generic mana', () => {
      expect(genericMana(0)).toEqual({ type: 'generic', amount: 0 });
    });

    it('should reject negative or fractional amounts', () => {
      expect(() => genericMana(-1)).toThrow(InvalidSymbolError);
      expect(() => genericMana(1.5)).toThrow(InvalidSymbolError);
      expect(() => genericHybridMana(-2, GREEN)).toThrow(InvalidSymbolError);
      expect(() => genericMana(Number.MAX_SAFE_INTEGER + 1)).toThrow(InvalidSymbolError);
    });

    it('should reject a hybrid of one color with itself', () => {
      expect(() => hybridMana(WHITE, WHITE)).toThrow('Hybrid symbol needs two different colors, got W/W');
      expect(() => phyrexianHybridMana(RED, RED)).toThrow(InvalidSymbolError);
    });

    it('should raise errors that share a base class', () => {
      expect(() => genericMana(-3)).toThrow(ManaCostError);

      let caught: unknown;
      try {
        genericMana(-3);
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(InvalidSymbolError);
      if (caught instanceof InvalidSymbolError) {
        expect(caught.name).toBe('InvalidSymbolError');
        expect(caught.reason).toBe('Generic amount must be a non-negative integer, got -3');
        expect(caught.span).toBeUndefined();
      }
    });
  });

  describe('Rule 107.4e - Hybrid orientation', () => {
    it('should store both spellings of a pair the same way', () => {
      expect(hybridMana(BLUE, WHITE)).toEqual(hybridMana(WHITE, BLUE));
      expect(hybridMana(BLUE, WHITE)).toEqual({ type: 'hybrid', first: WHITE, second: BLUE });
      expect(hybridMana(WHITE, RED)).toEqual({ type: 'hybrid', first: RED, second: WHITE });
    });

    it('should orient phyrexian hybrids the same way', () => {
      expect(phyrexianHybridMana(GREEN, RED)).toEqual({ type: 'phyrexian-hybrid', first: RED, second: GREEN });
    });
  });

  describe('Half colors', () => {
    it('should report both halves of a two-color hybrid', () => {
      const rg = phyrexianHybridMana(RED, GREEN);
      expect(leftHalfColor(rg)).toBe(RED);
      expect(rightHalfColor(rg)).toBe(GREEN);
      expect(symbolColors(rg)).toEqual([RED, GREEN]);
    });

    it('should report the same color on both halves of a monocolored symbol', () => {
      expect(leftHalfColor(coloredMana(BLUE))).toBe(BLUE);
      expect(rightHalfColor(phyrexianMana(BLUE))).toBe(BLUE);
      expect(symbolColors(coloredMana(BLUE))).toEqual([BLUE]);
    });

    it('should only color the right half of generic and colorless hybrids', () => {
      expect(leftHalfColor(genericHybridMana(2, WHITE))).toBeUndefined();
      expect(rightHalfColor(genericHybridMana(2, WHITE))).toBe(WHITE);
      expect(leftHalfColor(colorlessHybridMana(GREEN))).toBeUndefined();
      expect(symbolColors(colorlessHybridMana(GREEN))).toEqual([GREEN]);
    });

    it('should have no color for generic, colorless and snow', () => {
      expect(symbolColors(genericMana(3))).toEqual([]);
      expect(symbolColors(variableMana('Y'))).toEqual([]);
      expect(leftHalfColor(colorlessMana())).toBeUndefined();
      expect(rightHalfColor(snowMana())).toBeUndefined();
    });
  });

  describe('Rule 202.1 - Mana costs', () => {
    it('should freeze a cost built from symbols', () => {
      const cost = manaCost(genericMana(1), coloredMana(RED));
      expect(cost).toHaveLength(2);
      expect(Object.isFrozen(cost)).toBe(true);
    });

    it('should compare symbols by value', () => {
      expect(isSameSymbol(coloredMana(RED), coloredMana(RED))).toBe(true);
      expect(isSameSymbol(coloredMana(RED), phyrexianMana(RED))).toBe(false);
      expect(isSameSymbol(hybridMana(GREEN, BLUE), hybridMana(BLUE, GREEN))).toBe(true);
      expect(isSameSymbol(genericHybridMana(2, BLACK), genericHybridMana(3, BLACK))).toBe(false);
      expect(isSameSymbol(colorlessMana(), snowMana())).toBe(false);
    });
  });
});
