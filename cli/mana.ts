#!/usr/bin/env node
/**
 * CLI tool for inspecting mana costs
 *
 * Usage:
 *   npm run mana -- sort '{U}{C}{5}'
 *   npm run mana -- value --json '{5}{U}{U/B}'
 */

import { runManaCli } from './commands';

process.exitCode = runManaCli(process.argv.slice(2));
