/**
 * Centralized debug logging utility
 *
 * Debug levels:
 * - 0: No debug output (default)
 * - 1: Essential debugging - commands run and errors reported
 * - 2: Verbose debugging - every token the parser scans
 *
 * Usage:
 * import { debug } from './utils/debug';
 *
 * debug(1, '[cli] Essential debug message');
 * debug(2, '[parser] Verbose debug message with details:', data);
 */

export const DEBUG_ENV_VAR = 'MANA_DEBUG';

/**
 * Debug level from the MANA_DEBUG environment variable, read once
 */
let cachedDebugLevel: number | null = null;

export function parseDebugLevel(level: string | undefined): number {
  if (level === undefined || level === '') {
    return 0;
  }

  const parsed = parseInt(level, 10);

  if (isNaN(parsed) || parsed < 0) {
    return 0;
  }

  // Cap at level 2 (verbose)
  return Math.min(parsed, 2);
}

function getDebugLevel(): number {
  if (cachedDebugLevel === null) {
    cachedDebugLevel = parseDebugLevel(process.env[DEBUG_ENV_VAR]);
  }
  return cachedDebugLevel;
}

/**
 * Override the level, or pass null to read the environment again on next use
 */
export function setDebugLevel(level: number | null): void {
  cachedDebugLevel = level === null ? null : Math.max(0, Math.min(level, 2));
}

/**
 * Log a debug message if the current debug level is >= the required level
 * @param requiredLevel - Minimum debug level required to show this message (1 or 2)
 */
export function debug(requiredLevel: number, ...args: unknown[]): void {
  if (getDebugLevel() >= requiredLevel) {
    console.log(...args);
  }
}

export function debugWarn(requiredLevel: number, ...args: unknown[]): void {
  if (getDebugLevel() >= requiredLevel) {
    console.warn(...args);
  }
}

export function debugError(requiredLevel: number, ...args: unknown[]): void {
  if (getDebugLevel() >= requiredLevel) {
    console.error(...args);
  }
}

export function isDebugEnabled(requiredLevel: number): boolean {
  return getDebugLevel() >= requiredLevel;
}
