/**
 * Rule 105: Colors
 * The five colors, their one-letter codes and the color wheel
 */

// Rule 105.1 - There are five colors in the Magic game
export enum Color {
  WHITE = 'white',
  BLUE = 'blue',
  BLACK = 'black',
  RED = 'red',
  GREEN = 'green'
}

// Wheel order. Index positions drive every distance computation below.
export const WUBRG: readonly Color[] = [
  Color.WHITE,
  Color.BLUE,
  Color.BLACK,
  Color.RED,
  Color.GREEN
] as const;

export type ColorLetter = 'W' | 'U' | 'B' | 'R' | 'G';

const COLOR_LETTERS: Readonly<Record<Color, ColorLetter>> = {
  [Color.WHITE]: 'W',
  [Color.BLUE]: 'U',
  [Color.BLACK]: 'B',
  [Color.RED]: 'R',
  [Color.GREEN]: 'G'
};

const LETTER_COLORS: Readonly<Record<ColorLetter, Color>> = {
  W: Color.WHITE,
  U: Color.BLUE,
  B: Color.BLACK,
  R: Color.RED,
  G: Color.GREEN
};

// Rule 105.5 - Color pairs (exactly two colors)
export type ColorPair = readonly [Color, Color];

// All ten pairs, each in the orientation used when printing hybrid symbols
export const COLOR_PAIRS: readonly ColorPair[] = [
  [Color.WHITE, Color.BLUE],    // Azorius
  [Color.WHITE, Color.BLACK],   // Orzhov
  [Color.BLUE, Color.BLACK],    // Dimir
  [Color.BLUE, Color.RED],      // Izzet
  [Color.BLACK, Color.RED],     // Rakdos
  [Color.BLACK, Color.GREEN],   // Golgari
  [Color.RED, Color.GREEN],     // Gruul
  [Color.RED, Color.WHITE],     // Boros
  [Color.GREEN, Color.WHITE],   // Selesnya
  [Color.GREEN, Color.BLUE]     // Simic
] as const;

export function colorLetter(color: Color): ColorLetter {
  return COLOR_LETTERS[color];
}

function isColorLetter(letter: string): letter is ColorLetter {
  return Object.prototype.hasOwnProperty.call(LETTER_COLORS, letter);
}

/**
 * Look up a color by its letter, ignoring case. Returns undefined for
 * anything that is not one of W, U, B, R, G.
 */
export function colorFromLetter(letter: string): Color | undefined {
  const upper = letter.toUpperCase();
  return isColorLetter(upper) ? LETTER_COLORS[upper] : undefined;
}

export function colorIndex(color: Color): number {
  return WUBRG.indexOf(color);
}

export function colorName(color: Color): string {
  return color;
}

/**
 * Clockwise steps from `from` to `to` around the wheel, 0-4.
 */
export function wheelDistance(from: Color, to: Color): number {
  return (colorIndex(to) - colorIndex(from) + 5) % 5;
}

/**
 * Orient two distinct colors along the shorter arc of the wheel:
 * the first color is the one the second is 1 or 2 steps clockwise from.
 */
export function orientColorPair(a: Color, b: Color): ColorPair {
  return wheelDistance(a, b) <= 2 ? [a, b] : [b, a];
}

function colorAt(start: number, step: number): Color {
  return WUBRG[(start + step) % 5];
}

// Offsets from a starting color, listed in display order.
// Shards read from one end, wedges from the ally of the center color.
const COMBINATION_PATTERNS: readonly (readonly number[])[] = [
  [0, 1],
  [0, 2],
  [0, 1, 2],
  [1, 3, 0],
  [0, 1, 2, 3]
];

/**
 * Order a combination of distinct colors the way they are conventionally
 * printed: pairs along the shorter arc (`RG`, `GW`), shards as three
 * neighbours (`GWU`), wedges as two allies around their enemy (`URW`),
 * four colors starting after the missing one, five colors as WUBRG.
 */
export function orderColors(colors: readonly Color[]): Color[] {
  const distinct = WUBRG.filter(color => colors.includes(color));

  if (distinct.length <= 1 || distinct.length === 5) {
    return distinct;
  }

  for (const pattern of COMBINATION_PATTERNS) {
    if (pattern.length !== distinct.length) continue;

    for (let start = 0; start < 5; start++) {
      const candidate = pattern.map(step => colorAt(start, step));
      if (candidate.every(color => distinct.includes(color))) {
        return candidate;
      }
    }
  }

  // Every subset of the wheel matches one of the patterns above
  throw new Error(`No color order for ${distinct.join(', ')}`);
}
