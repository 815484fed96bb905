/**
 * Engine Errors
 *
 * Analysis itself never throws for well-typed input. These signal
 * caller mistakes that must fail fast.
 */

/** Input that breaks the engine's contract: null collections, inverted ranges, bad dates. */
export class LedgerContractError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LedgerContractError';
  }
}

/** Raised by a forecasting method that cannot fit the series it was given. */
export class ForecastMethodError extends Error {
  constructor(
    public method: string,
    message: string
  ) {
    super(`${method}: ${message}`);
    this.name = 'ForecastMethodError';
  }
}
