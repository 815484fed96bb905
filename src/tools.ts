/**
 * MCP tool and prompt definitions.
 *
 * Prompts are thin wrappers that ask the client to call an analysis tool,
 * forwarding only the arguments that tool accepts.
 */

import { FORECAST_METHODS } from './insights/forecast/forecast-engine.js';

// ─── Tool Definitions ────────────────────────────────────────

const RANGE_PROPERTIES = {
  ledgerPath: {
    type: 'string' as const,
    description: 'Ledger JSON export to analyse (default: configured ledgerPath or ~/.ledgerlens/ledger.json)',
  },
  startDate: {
    type: 'string' as const,
    description: 'First day of the analysis range, YYYY-MM-DD',
  },
  endDate: {
    type: 'string' as const,
    description: 'Last day of the analysis range, YYYY-MM-DD (default: today)',
  },
  days: {
    type: 'number' as const,
    description: 'Length of the range in days when startDate is omitted (default: 30)',
  },
};

function analysisTool(name: string, description: string) {
  return {
    name,
    description,
    inputSchema: { type: 'object' as const, properties: RANGE_PROPERTIES },
  };
}

export const TOOLS = [
  analysisTool(
    'generate_insights',
    'Full financial insights for a date range: revenue trends, anomalies, next-month forecast, and recommendations, with a summary.'
  ),
  {
    name: 'generate_forecast',
    description:
      'Forecast next month revenue, expenses, profit and new customers, plus a multi-month revenue outlook. Records the forecast so its accuracy can be tracked.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        ...RANGE_PROPERTIES,
        periods: {
          type: 'number' as const,
          description: 'Months in the revenue outlook, 1-12 (default: 3)',
        },
        method: {
          type: 'string' as const,
          enum: [...FORECAST_METHODS],
          description: 'Outlook method (default: auto)',
        },
      },
    },
  },
  analysisTool(
    'detect_anomalies',
    'Find unusual revenue days, weekly expense spikes, unusually large sales, and elevated return rates.'
  ),
  analysisTool(
    'analyze_trends',
    'Compare revenue, expenses and transaction volume against the previous period of the same length, and spot day-of-week and seasonal sales patterns.'
  ),
  analysisTool(
    'generate_recommendations',
    'Actionable recommendations: top products, inactive customers, overdue invoices, supplier and customer concentration, and margins.'
  ),
  {
    name: 'forecast_accuracy',
    description:
      'Score past forecasts against the ledger once their month has passed, and report accuracy and its trend.',
    inputSchema: {
      type: 'object' as const,
      properties: { ledgerPath: RANGE_PROPERTIES.ledgerPath },
    },
  },
  {
    name: 'get_capabilities',
    description: 'Show the ledger and history locations, active thresholds, and available tools.',
    inputSchema: { type: 'object' as const, properties: {} },
  },
];

// ─── Prompts ─────────────────────────────────────────────────

export const PROMPTS = [
  {
    name: 'insights',
    description: 'Financial insights for the last 30 days (or a given range)',
    arguments: [
      { name: 'startDate', description: 'First day, YYYY-MM-DD (optional)', required: false },
      { name: 'endDate', description: 'Last day, YYYY-MM-DD (optional)', required: false },
    ],
  },
  {
    name: 'forecast',
    description: 'Next month forecast and revenue outlook',
    arguments: [
      { name: 'periods', description: 'Months in the outlook (optional)', required: false },
    ],
  },
  {
    name: 'anomalies',
    description: 'Unusual activity in the last 30 days',
    arguments: [{ name: 'days', description: 'Days to look back (optional)', required: false }],
  },
  {
    name: 'trends',
    description: 'Trends against the previous period',
    arguments: [{ name: 'days', description: 'Days to look back (optional)', required: false }],
  },
  {
    name: 'recommendations',
    description: 'What to act on next',
    arguments: [],
  },
];

const PROMPT_TOOLS: Record<string, { tool: string; argMap: Record<string, string> }> = {
  insights: { tool: 'generate_insights', argMap: { startDate: 'startDate', endDate: 'endDate' } },
  forecast: { tool: 'generate_forecast', argMap: { periods: 'periods' } },
  anomalies: { tool: 'detect_anomalies', argMap: { days: 'days' } },
  trends: { tool: 'analyze_trends', argMap: { days: 'days' } },
  recommendations: { tool: 'generate_recommendations', argMap: {} },
};

export type PromptMessage = {
  description: string;
  messages: Array<{ role: 'user'; content: { type: 'text'; text: string } }>;
};

/** Expand a prompt into the user message that asks for its tool. */
export function buildPrompt(name: string, promptArgs: Record<string, string> = {}): PromptMessage {
  const prompt = PROMPTS.find((p) => p.name === name);
  const mapping = PROMPT_TOOLS[name];
  if (!prompt || !mapping) {
    throw new Error(`Unknown prompt: ${name}`);
  }

  const toolArgs: Record<string, string> = {};
  for (const [promptKey, toolKey] of Object.entries(mapping.argMap)) {
    const value = promptArgs[promptKey];
    if (value) {
      toolArgs[toolKey] = value;
    }
  }

  const argsDescription =
    Object.keys(toolArgs).length > 0 ? ` with ${JSON.stringify(toolArgs)}` : '';

  return {
    description: prompt.description,
    messages: [
      {
        role: 'user',
        content: {
          type: 'text',
          text: `Use the ledgerlens ${mapping.tool} tool${argsDescription} and summarise the findings.`,
        },
      },
    ],
  };
}
