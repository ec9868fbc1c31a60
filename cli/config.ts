/**
 * CLI configuration
 */
import dotenv from 'dotenv';
import { DEBUG_ENV_VAR, debugWarn, parseDebugLevel } from '../src/utils/debug';

dotenv.config();

export type OutputFormat = 'text' | 'json';

export interface ManaCliConfig {
  readonly debugLevel: number;
  readonly sortOutput: boolean;
  readonly outputFormat: OutputFormat;
}

function parseFlag(value: string | undefined): boolean {
  return value === '1' || value?.toLowerCase() === 'true';
}

function parseOutputFormat(value: string | undefined): OutputFormat {
  if (value === undefined || value === '' || value === 'text') return 'text';
  if (value === 'json') return 'json';
  debugWarn(1, `[config] Ignoring MANA_OUTPUT=${value}, expected 'text' or 'json'`);
  return 'text';
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ManaCliConfig {
  return {
    debugLevel: parseDebugLevel(env[DEBUG_ENV_VAR]),
    sortOutput: parseFlag(env.MANA_SORT),
    outputFormat: parseOutputFormat(env.MANA_OUTPUT)
  };
}

export const config = loadConfig();
