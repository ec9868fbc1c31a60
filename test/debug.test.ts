/**
 * Tests for the debug logging utility
 */
import { afterEach, describe, it, expect, vi } from 'vitest';
import {
  DEBUG_ENV_VAR,
  debug,
  debugError,
  debugWarn,
  isDebugEnabled,
  parseDebugLevel,
  setDebugLevel
} from '../src/utils/debug';

describe('Debug logging', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    delete process.env[DEBUG_ENV_VAR];
  });

  it('should parse levels from the environment value', () => {
    expect(parseDebugLevel(undefined)).toBe(0);
    expect(parseDebugLevel('')).toBe(0);
    expect(parseDebugLevel('verbose')).toBe(0);
    expect(parseDebugLevel('-1')).toBe(0);
    expect(parseDebugLevel('1')).toBe(1);
    expect(parseDebugLevel('5')).toBe(2);
  });

  it('should stay silent by default', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    debug(1, '[test] hidden');
    expect(log).not.toHaveBeenCalled();
    expect(isDebugEnabled(1)).toBe(false);
  });

  it('should log messages up to the current level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    setDebugLevel(1);

    debug(1, '[test] shown', 42);
    debug(2, '[test] too verbose');
    debugWarn(1, '[test] warning');
    debugError(2, '[test] verbose error');

    expect(log).toHaveBeenCalledTimes(1);
    expect(log).toHaveBeenCalledWith('[test] shown', 42);
    expect(warn).toHaveBeenCalledWith('[test] warning');
    expect(error).not.toHaveBeenCalled();
  });

  it('should read the level from MANA_DEBUG once reset', () => {
    process.env[DEBUG_ENV_VAR] = '2';
    setDebugLevel(null);
    expect(isDebugEnabled(2)).toBe(true);
  });
});
