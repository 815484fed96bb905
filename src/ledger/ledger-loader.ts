/**
 * Ledger Loader
 *
 * Reads a JSON ledger export, validates it, and builds the read model the
 * engine analyses. Every failure surfaces as a LedgerContractError.
 */

import { existsSync, readFileSync } from 'node:fs';
import { LedgerSchema, describeIssue } from '../validators.js';
import { LedgerSnapshot } from './ledger-snapshot.js';
import { LedgerContractError } from '../insights/errors.js';
import { resolvePaths } from '../config/paths.js';
import type { LedgerLensConfig } from '../config/types.js';

/** Explicit path first, then the configured one, then ~/.ledgerlens/ledger.json. */
export function resolveLedgerPath(explicit?: string, config?: LedgerLensConfig | null): string {
  return explicit ?? config?.ledgerPath ?? resolvePaths().ledger;
}

/** Validate already-parsed JSON into a snapshot. */
export function parseLedger(raw: unknown): LedgerSnapshot {
  const result = LedgerSchema.safeParse(raw);
  if (!result.success) {
    throw new LedgerContractError(`Invalid ledger: ${describeIssue(result.error)}`);
  }
  return new LedgerSnapshot(result.data);
}

export function loadLedger(path: string): LedgerSnapshot {
  if (!existsSync(path)) {
    throw new LedgerContractError(`Ledger file not found: ${path}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new LedgerContractError(`Ledger file ${path} is not valid JSON: ${reason}`);
  }
  return parseLedger(raw);
}
