/**
 * Mana cost type exports
 */

// Rule 105 - Colors
export * from './colors';

// Rule 107.4 - Mana symbols, Rule 202.1 - Mana costs
export * from './symbols';
