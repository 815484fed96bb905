#!/usr/bin/env node

/**
 * LedgerLens CLI
 *
 * Financial insights from the command line.
 *
 * Usage:
 *   ledgerlens insights [--from 2026-06-01] [--to 2026-06-30]
 *   ledgerlens forecast [--periods 6] [--method spectral]
 *   ledgerlens anomalies [--days 14]
 *   ledgerlens accuracy
 */

import { AnalysisRunner } from './orchestrator/analysis-runner.js';
import type { RunResult } from './orchestrator/analysis-runner.js';
import { AnalysisArgsSchema, ForecastArgsSchema, parseArgs } from './validators.js';

// ─── Argument Parsing ───────────────────────────────────────

function parseArgv(argv: string[]): { command: string; flags: Record<string, string> } {
  const args = argv.slice(2);
  let command = args[0] ?? 'help';
  let flagStart = 1;

  // "help forecast" → "help-forecast"
  if (command === 'help' && args[1] && !args[1].startsWith('--')) {
    command = `help-${args[1]}`;
    flagStart = 2;
  }

  const flags: Record<string, string> = {};

  for (let i = flagStart; i < args.length; i++) {
    const arg = args[i]!;
    if (arg.startsWith('--')) {
      const key = arg.slice(2);
      // Boolean flags (--json) vs value flags (--days 14)
      if (i + 1 < args.length && !args[i + 1]!.startsWith('--')) {
        flags[key] = args[++i]!;
      } else {
        flags[key] = '';
      }
    }
  }

  return { command, flags };
}

/** Map CLI flags onto the tool argument names; validation happens in the schemas. */
function toolArgs(flags: Record<string, string>): Record<string, string | undefined> {
  return {
    ledgerPath: flags['ledger'],
    startDate: flags['from'],
    endDate: flags['to'],
    days: flags['days'],
    periods: flags['periods'],
    method: flags['method'],
  };
}

function render<T>(result: RunResult<T>, flags: Record<string, string>): string {
  return 'json' in flags ? JSON.stringify(result.data, null, 2) : result.markdown;
}

// ─── Help ───────────────────────────────────────────────────

function showHelp(topic?: string): string {
  if (topic && COMMAND_HELP[topic]) {
    return COMMAND_HELP[topic];
  }

  if (topic) {
    return `Unknown command: ${topic}\n\n${MAIN_HELP}`;
  }

  return MAIN_HELP;
}

const MAIN_HELP = `LedgerLens CLI - Financial Insights

Usage:
  ledgerlens <command> [options]
  ledgerlens help <command>

Analysis:
  insights          Trends, anomalies, forecast and recommendations in one report
  forecast          Next month forecast plus a multi-month revenue outlook
  anomalies         Unusual revenue days, expense spikes, large sales, return rates
  trends            Period-over-period change, busiest weekday, seasonal months
  recommendations   Top products, inactive customers, overdue invoices, concentration, margins

History:
  accuracy          Score past forecasts against actuals

Options:
  --ledger <path>   Ledger JSON export (default: configured ledgerPath or ~/.ledgerlens/ledger.json)
  --from <date>     First day of the range, YYYY-MM-DD
  --to <date>       Last day of the range, YYYY-MM-DD (default: today)
  --days <n>        Range length when --from is omitted (default: 30)
  --json            Print the raw result as JSON instead of Markdown

Examples:
  ledgerlens insights                          Last 30 days
  ledgerlens insights --from 2026-04-01 --to 2026-06-30
  ledgerlens forecast --periods 6              Six-month revenue outlook
  ledgerlens anomalies --days 7 --json

Environment Variables:
  LEDGERLENS_HOME   Config directory (default: ~/.ledgerlens)`;

const COMMAND_HELP: Record<string, string> = {
  insights: `ledgerlens insights - Full Financial Insights

Runs every analysis over the range and prints a summary, the next month
forecast, and each non-empty section. With too few transactions in the
range, only the reason is printed.

Options:
  --ledger, --from, --to, --days, --json`,

  forecast: `ledgerlens forecast - Forecast and Outlook

Forecasts next month's revenue, expenses, profit and new customers from
the trailing twelve months, then projects revenue for --periods months.
The next month forecast is recorded so "ledgerlens accuracy" can score it.

Options:
  --periods <n>     Months in the outlook, 1-12 (default: 3)
  --method <m>      auto | holt-winters | spectral | combined (default: auto)
  --ledger, --from, --to, --days, --json`,

  anomalies: `ledgerlens anomalies - Unusual Activity

Revenue days beyond the z-score threshold, weekly expense spikes,
unusually large sales, and return rates above the baseline.

Options:
  --ledger, --from, --to, --days, --json`,

  trends: `ledgerlens trends - Trends

Revenue, expenses and transaction volume against the previous period of the
same length, plus day-of-week and seasonal sales patterns. Nothing is
compared when the previous period had no activity.

Options:
  --ledger, --from, --to, --days, --json`,

  recommendations: `ledgerlens recommendations - Recommendations

Top product by margin, inactive customers, overdue invoices, supplier and
customer concentration, and profit margin.

Options:
  --ledger, --from, --to, --days, --json`,

  accuracy: `ledgerlens accuracy - Forecast Accuracy

Fills in actuals for recorded forecasts whose month has passed, keeps the
newest 24 records, and reports average accuracy and its trend.

Options:
  --ledger, --json`,
};

// ─── Main ───────────────────────────────────────────────────

async function run(
  runner: AnalysisRunner,
  command: string,
  flags: Record<string, string>
): Promise<string> {
  const args = toolArgs(flags);
  switch (command) {
    case 'insights':
      return render(await runner.insights(parseArgs(AnalysisArgsSchema, args)), flags);
    case 'forecast':
      return render(await runner.forecast(parseArgs(ForecastArgsSchema, args)), flags);
    case 'anomalies':
      return render(await runner.anomalies(parseArgs(AnalysisArgsSchema, args)), flags);
    case 'trends':
      return render(await runner.trends(parseArgs(AnalysisArgsSchema, args)), flags);
    case 'recommendations':
      return render(await runner.recommendations(parseArgs(AnalysisArgsSchema, args)), flags);
    case 'accuracy':
      return render(runner.accuracy(parseArgs(AnalysisArgsSchema, args)), flags);
    case 'help':
    case '--help':
    case '-h':
      return showHelp();
    default:
      if (command.startsWith('help-')) {
        return showHelp(command.slice(5));
      }
      console.error(`Unknown command: ${command}\n`);
      return showHelp();
  }
}

async function main() {
  const { command, flags } = parseArgv(process.argv);
  const runner = new AnalysisRunner();

  try {
    console.log(await run(runner, command, flags));
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    console.error(`Error: ${message}`);
    process.exitCode = 1;
  } finally {
    runner.close();
  }
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
