/**
 * Configuration Types
 *
 * Shape of ~/.ledgerlens/config.json. The Zod schema in settings.ts
 * validates against these.
 */

import type { ThresholdConfig } from './thresholds.js';

/** Presentation and analysis settings. */
export interface LedgerLensSettings {
  currency: string;
  locale: string;
  thresholds?: ThresholdConfig;
}

/** Root configuration, stored in ~/.ledgerlens/config.json */
export interface LedgerLensConfig {
  version: 1;
  /** Ledger export to analyse; defaults to ~/.ledgerlens/ledger.json */
  ledgerPath?: string;
  settings: LedgerLensSettings;
}
