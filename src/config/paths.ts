/**
 * File Locations
 *
 * Everything LedgerLens reads or writes by default sits in one home
 * directory, LEDGERLENS_HOME when set and ~/.ledgerlens otherwise:
 *
 *   config.json   settings, including the configured ledger
 *   ledger.json   ledger export used when none is configured
 *   history.db    recorded forecasts and their accuracy
 */

import { mkdirSync } from 'node:fs';
import { homedir } from 'node:os';
import { dirname, join, resolve } from 'node:path';

export interface LedgerLensPaths {
  home: string;
  config: string;
  ledger: string;
  historyDb: string;
}

/** A relative LEDGERLENS_HOME is taken from the working directory. */
export function resolvePaths(env: NodeJS.ProcessEnv = process.env): LedgerLensPaths {
  const override = env['LEDGERLENS_HOME']?.trim();
  const home = override ? resolve(override) : join(homedir(), '.ledgerlens');

  return {
    home,
    config: join(home, 'config.json'),
    ledger: join(home, 'ledger.json'),
    historyDb: join(home, 'history.db'),
  };
}

/** Create the (private) directory a file is about to be written into. */
export function ensureParentDir(filePath: string): void {
  mkdirSync(dirname(filePath), { recursive: true, mode: 0o700 });
}
