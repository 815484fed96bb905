#!/usr/bin/env node

/**
 * LedgerLens MCP Server
 *
 * Local financial insights over a JSON ledger export: trends, anomalies,
 * forecasts with accuracy tracking, and recommendations. Nothing leaves
 * the machine; forecast history lives in ~/.ledgerlens/history.db.
 *
 * Tools:
 *   Analysis: generate_insights, generate_forecast, detect_anomalies,
 *             analyze_trends, generate_recommendations
 *   History:  forecast_accuracy
 *   Info:     get_capabilities
 */

import { existsSync } from 'node:fs';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  ListPromptsRequestSchema,
  GetPromptRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';

import { AnalysisRunner } from './orchestrator/analysis-runner.js';
import { AnalysisArgsSchema, ForecastArgsSchema, parseArgs } from './validators.js';
import { readConfig } from './config/settings.js';
import { resolvePaths } from './config/paths.js';
import { resolveThresholds } from './config/thresholds.js';
import { resolveLedgerPath } from './ledger/ledger-loader.js';
import { TOOLS, PROMPTS, buildPrompt } from './tools.js';

const VERSION = '1.0.0';

const SERVER_INSTRUCTIONS = `LedgerLens analyses a local ledger export (sales, purchases, invoices, inventory) and reports business insights.

Use ledgerlens tools when the user asks about:
- How the business is doing, a financial overview, insights → generate_insights
- Next month's revenue, expenses or cash flow, projections → generate_forecast
- Unusual transactions, expense spikes, return rates → detect_anomalies
- Revenue growth or decline, busiest weekdays, seasonal months → analyze_trends
- What to do next, overdue invoices, margins, concentration risk → generate_recommendations
- How reliable past forecasts were → forecast_accuracy
- Where the ledger lives, configured thresholds → get_capabilities

Common triggers: "insights", "forecast", "cash flow", "anomalies", "trends", "recommendations", "how accurate"`;

const server = new Server(
  { name: 'ledgerlens', version: VERSION },
  {
    capabilities: { tools: {}, prompts: {} },
    instructions: SERVER_INSTRUCTIONS,
  }
);

const runner = new AnalysisRunner();

// ─── Tools & Prompts ─────────────────────────────────────────

server.setRequestHandler(ListToolsRequestSchema, () => {
  return { tools: TOOLS };
});

server.setRequestHandler(ListPromptsRequestSchema, () => {
  return { prompts: PROMPTS };
});

server.setRequestHandler(GetPromptRequestSchema, (request) => {
  const { name, arguments: promptArgs } = request.params;
  return buildPrompt(name, promptArgs);
});

// ─── Tool Handlers ───────────────────────────────────────────

type ToolResponse = { content: Array<{ type: 'text'; text: string }> };

function text(markdown: string): ToolResponse {
  return { content: [{ type: 'text', text: markdown }] };
}

server.setRequestHandler(CallToolRequestSchema, async (request) => {
  const { name, arguments: args } = request.params;

  try {
    switch (name) {
      case 'generate_insights':
        return text((await runner.insights(parseArgs(AnalysisArgsSchema, args))).markdown);
      case 'generate_forecast':
        return text((await runner.forecast(parseArgs(ForecastArgsSchema, args))).markdown);
      case 'detect_anomalies':
        return text((await runner.anomalies(parseArgs(AnalysisArgsSchema, args))).markdown);
      case 'analyze_trends':
        return text((await runner.trends(parseArgs(AnalysisArgsSchema, args))).markdown);
      case 'generate_recommendations':
        return text((await runner.recommendations(parseArgs(AnalysisArgsSchema, args))).markdown);
      case 'forecast_accuracy':
        return text(runner.accuracy(parseArgs(AnalysisArgsSchema, args)).markdown);
      case 'get_capabilities':
        return handleGetCapabilities();
      default:
        throw new Error(`Unknown tool: ${name}`);
    }
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : 'Unknown error';
    return {
      content: [{ type: 'text' as const, text: `Error: ${errorMessage}` }],
      isError: true,
    };
  }
});

// ─── Capabilities ────────────────────────────────────────────

function handleGetCapabilities(): ToolResponse {
  const config = readConfig();
  const ledgerPath = resolveLedgerPath(undefined, config);
  const paths = resolvePaths();

  const parts: string[] = [];
  parts.push(`# LedgerLens MCP v${VERSION}`);
  parts.push('');

  parts.push('## Status');
  parts.push('');
  parts.push('| Component | Status |');
  parts.push('|-----------|--------|');
  parts.push(`| Config directory | \`${paths.home}\` |`);
  parts.push(`| Config file | ${config ? 'Found' : 'Not found (using defaults)'} |`);
  parts.push(`| Ledger | \`${ledgerPath}\`${existsSync(ledgerPath) ? '' : ' (missing)'} |`);
  parts.push(`| Forecast history | \`${paths.historyDb}\` |`);
  parts.push(
    `| Currency | ${config?.settings.currency ?? 'USD'} (${config?.settings.locale ?? 'en-US'}) |`
  );
  parts.push('');

  parts.push('## Analysis Thresholds');
  parts.push('');
  const t = resolveThresholds(config?.settings.thresholds);
  parts.push('| Threshold | Value |');
  parts.push('|-----------|-------|');
  parts.push(`| Minimum transactions | ${t.minimumTransactions} |`);
  parts.push(`| Significant revenue change | ${t.significantChangePercent}% |`);
  parts.push(`| Sales volume change | ${t.volumeChangePercent}% |`);
  parts.push(`| Anomaly z-score | ${t.zScoreThreshold} |`);
  parts.push(`| Large transaction z-score | ${t.largeTransactionZScore} |`);
  parts.push(`| Inventory runway | ${t.inventoryRunwayDays}d |`);
  parts.push(`| Inactive customer | ${t.inactiveCustomerDays}d |`);
  parts.push(`| Overdue warning | ${t.overdueWarningDays}d |`);
  parts.push(`| Supplier concentration | ${t.supplierConcentrationPercent}% |`);
  parts.push(`| Customer concentration | ${t.customerConcentrationPercent}% |`);
  parts.push(`| Low / strong margin | ${t.lowMarginPercent}% / ${t.strongMarginPercent}% |`);
  parts.push('');

  parts.push('## Available Tools');
  parts.push('');
  parts.push('### Analysis');
  parts.push('- **generate_insights** - Everything below in one report, with a summary');
  parts.push('- **generate_forecast** - Next month forecast and revenue outlook');
  parts.push('- **detect_anomalies** - Unusual days, expense spikes, large sales, returns');
  parts.push('- **analyze_trends** - Period-over-period, weekday and seasonal patterns');
  parts.push('- **generate_recommendations** - Products, customers, invoices, suppliers, margins');
  parts.push('');
  parts.push('### History');
  parts.push('- **forecast_accuracy** - How past forecasts compared with actuals');

  return text(parts.join('\n'));
}

// ─── Start Server ────────────────────────────────────────────

async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`[ledgerlens] MCP server v${VERSION} started`);
}

function shutdown() {
  runner.close();
  process.exit(0);
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

main().catch((error) => {
  console.error('[ledgerlens] Fatal error:', error);
  process.exit(1);
});
