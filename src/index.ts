#!/usr/bin/env node

/**
 * Quarterscope MCP Server
 *
 * Quarter-over-quarter growth and aggregate reports over a payments dataset.
 * Reads an existing SQLite database; never writes to it.
 *
 * Tools:
 *   Growth:   quarterly_growth, growth_from_points
 *   Reports:  transaction_totals, device_usage, insurance_totals,
 *             category_trends, user_engagement
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

import { readSettings, resolveDatasetPath } from './config/settings.js';
import { resolveConfigDir } from './config/paths.js';
import { resolveThresholds } from './config/thresholds.js';
import { DatasetStore } from './dataset/dataset-store.js';
import { formatErrorMessage } from './validators.js';
import {
  createReportRunner,
  runGrowthFromPoints,
  type ReportRunner,
} from './orchestrator/report-runner.js';

const SERVER_VERSION = '1.0.0';

const SERVER_INSTRUCTIONS = `Quarterscope reports on a payments dataset: transactions, insurance policies, device brands and user engagement by state.

Use quarterscope tools when the user asks about:
- Which states grew fastest, quarter-over-quarter change, growth rates → quarterly_growth
- Growth for a series they provide themselves → growth_from_points
- Transaction volume or value by state and quarter → transaction_totals
- Device brands, phone makers, registered users by brand → device_usage
- Insurance policies sold, insurance penetration → insurance_totals
- Payment categories over time → category_trends
- App opens versus registered users → user_engagement
- Where the dataset lives, what is configured → get_capabilities`;

const server = new Server(
  { name: 'quarterscope', version: SERVER_VERSION },
  {
    capabilities: { tools: {}, prompts: {} },
    instructions: SERVER_INSTRUCTIONS,
  }
);

// ─── Tool Definitions ────────────────────────────────────────

const STATES_PROPERTY = {
  type: 'array' as const,
  items: { type: 'string' as const },
  description: 'Restrict to these state names (optional — defaults to all states)',
};

server.setRequestHandler(ListToolsRequestSchema, () => {
  return {
    tools: [
      {
        name: 'quarterly_growth',
        description:
          'Quarter-over-quarter growth per state, ranked by growth percentage. Q1 is compared against Q4 of the previous year. Use when the user asks: "which states grew fastest", "growth rate", "quarterly change".',
        inputSchema: {
          type: 'object' as const,
          properties: {
            source: {
              type: 'string' as const,
              enum: ['transactions', 'insurance'],
              description: 'Dataset to analyze (default: transactions)',
            },
            measure: {
              type: 'string' as const,
              enum: ['count', 'amount'],
              description: 'Sum of counts or of amounts per quarter (default: count)',
            },
            states: STATES_PROPERTY,
            limit: {
              type: 'number' as const,
              description: 'Maximum rows in the growth table (default from settings)',
            },
          },
        },
      },
      {
        name: 'growth_from_points',
        description:
          'Compute quarter-over-quarter growth for a series supplied in the call. Each point needs entityKey, year, quarter (1-4) and value, with at most one point per entity and quarter.',
        inputSchema: {
          type: 'object' as const,
          properties: {
            points: {
              type: 'array' as const,
              items: {
                type: 'object' as const,
                properties: {
                  entityKey: { type: 'string' as const },
                  year: { type: 'number' as const },
                  quarter: { type: 'number' as const },
                  value: { type: 'number' as const },
                },
                required: ['entityKey', 'year', 'quarter', 'value'],
              },
              description: 'Pre-aggregated metric points',
            },
            entityLabel: {
              type: 'string' as const,
              description: 'Column heading for the entity (e.g., "Brand")',
            },
            limit: {
              type: 'number' as const,
              description: 'Maximum rows in the growth table',
            },
          },
          required: ['points'],
        },
      },
      {
        name: 'transaction_totals',
        description: 'Total transaction count and amount by state and quarter.',
        inputSchema: {
          type: 'object' as const,
          properties: { states: STATES_PROPERTY },
        },
      },
      {
        name: 'device_usage',
        description: 'Registered users and average usage share per device brand.',
        inputSchema: {
          type: 'object' as const,
          properties: {},
        },
      },
      {
        name: 'insurance_totals',
        description: 'Insurance policies sold and their total value by state and quarter.',
        inputSchema: {
          type: 'object' as const,
          properties: { states: STATES_PROPERTY },
        },
      },
      {
        name: 'category_trends',
        description: 'Yearly transaction amount per payment category.',
        inputSchema: {
          type: 'object' as const,
          properties: {
            states: STATES_PROPERTY,
            categories: {
              type: 'array' as const,
              items: { type: 'string' as const },
              description: 'Restrict to these categories (optional)',
            },
          },
        },
      },
      {
        name: 'user_engagement',
        description: 'Registered users against app opens per state.',
        inputSchema: {
          type: 'object' as const,
          properties: { states: STATES_PROPERTY },
        },
      },
      {
        name: 'get_capabilities',
        description: 'Returns available tools, the dataset location and the active settings.',
        inputSchema: {
          type: 'object' as const,
          properties: {},
        },
      },
    ],
  };
});

// ─── Prompts ─────────────────────────────────────────────────

const PROMPTS = [
  {
    name: 'fastest-growing-states',
    description: 'Rank states by quarter-over-quarter transaction growth',
    arguments: [
      {
        name: 'measure',
        description: 'count or amount (optional — defaults to count)',
        required: false,
      },
    ],
  },
  {
    name: 'insurance-growth',
    description: 'Rank states by quarter-over-quarter insurance growth',
  },
  {
    name: 'device-landscape',
    description: 'Summarize device brand usage',
  },
];

server.setRequestHandler(ListPromptsRequestSchema, () => {
  return { prompts: PROMPTS };
});

server.setRequestHandler(GetPromptRequestSchema, (request) => {
  const { name, arguments: promptArgs } = request.params;

  const toolMap: Record<string, { tool: string; args: Record<string, string> }> = {
    'fastest-growing-states': {
      tool: 'quarterly_growth',
      args: { source: 'transactions', measure: promptArgs?.['measure'] || 'count' },
    },
    'insurance-growth': { tool: 'quarterly_growth', args: { source: 'insurance' } },
    'device-landscape': { tool: 'device_usage', args: {} },
  };

  const prompt = PROMPTS.find((p) => p.name === name);
  const mapping = toolMap[name];
  if (!prompt || !mapping) {
    throw new Error(`Unknown prompt: ${name}`);
  }

  const argsDescription =
    Object.keys(mapping.args).length > 0 ? ` with ${JSON.stringify(mapping.args)}` : '';

  return {
    description: prompt.description,
    messages: [
      {
        role: 'user' as const,
        content: {
          type: 'text' as const,
          text: `Use the quarterscope ${mapping.tool} tool${argsDescription} and summarize the report.`,
        },
      },
    ],
  };
});

// ─── Tool Handlers ───────────────────────────────────────────

type ToolResult = { content: Array<{ type: 'text'; text: string }> };

server.setRequestHandler(CallToolRequestSchema, (request) => {
  const { name, arguments: args } = request.params;

  try {
    switch (name) {
      case 'quarterly_growth':
        return withRunner((runner) => runner.growth(args));
      case 'growth_from_points':
        return textResult(runGrowthFromPoints(args, readSettings()));
      case 'transaction_totals':
        return withRunner((runner) => runner.transactions(args));
      case 'device_usage':
        return withRunner((runner) => runner.devices());
      case 'insurance_totals':
        return withRunner((runner) => runner.insurance(args));
      case 'category_trends':
        return withRunner((runner) => runner.categories(args));
      case 'user_engagement':
        return withRunner((runner) => runner.engagement(args));
      case 'get_capabilities':
        return handleGetCapabilities();
      default:
        throw new Error(`Unknown tool: ${name}`);
    }
  } catch (error) {
    const errorMessage = formatErrorMessage(error);
    console.error(`[quarterscope] ${name} failed: ${errorMessage}`);
    return {
      content: [{ type: 'text' as const, text: `Error: ${errorMessage}` }],
      isError: true,
    };
  }
});

function textResult(text: string): ToolResult {
  return { content: [{ type: 'text', text }] };
}

/**
 * Open the dataset for a single call and close it afterwards.
 */
function withRunner(render: (runner: ReportRunner) => string): ToolResult {
  const settings = readSettings();
  const store = new DatasetStore(resolveDatasetPath(settings));
  try {
    return textResult(render(createReportRunner(store, settings)));
  } finally {
    store.close();
  }
}

// ─── Capabilities ────────────────────────────────────────────

function handleGetCapabilities(): ToolResult {
  const settings = readSettings();
  const datasetPath = resolveDatasetPath(settings);
  const thresholds = resolveThresholds(settings.report.thresholds);

  const parts: string[] = [];
  parts.push('# Quarterscope Capabilities');
  parts.push('');
  parts.push('## Configuration');
  parts.push('');
  parts.push(`- **Config directory:** ${resolveConfigDir()}`);
  parts.push(
    `- **Dataset:** ${datasetPath} ${existsSync(datasetPath) ? '(found)' : '(not found)'}`
  );
  parts.push(`- **Growth table rows:** ${settings.report.limit}`);
  parts.push(
    `- **Highlights:** surge at +${thresholds.surgePercent}%, decline at -${thresholds.declinePercent}%`
  );
  parts.push('');
  parts.push('## Available Tools');
  parts.push('');
  parts.push('### Growth');
  parts.push('- **quarterly_growth** — Quarter-over-quarter growth by state');
  parts.push('- **growth_from_points** — Growth for a series supplied in the call');
  parts.push('');
  parts.push('### Reports');
  parts.push('- **transaction_totals** — Transactions by state and quarter');
  parts.push('- **device_usage** — Registered users by device brand');
  parts.push('- **insurance_totals** — Insurance policies by state and quarter');
  parts.push('- **category_trends** — Yearly amount per payment category');
  parts.push('- **user_engagement** — App opens against registered users');

  if (!existsSync(datasetPath)) {
    parts.push('');
    parts.push('## Setup');
    parts.push('');
    parts.push(
      'Point `QUARTERSCOPE_DB` at the dataset database, or set `dataset.path` in ' +
        `\`${resolveConfigDir()}/settings.json\`.`
    );
  }

  return textResult(parts.join('\n'));
}

// ─── Start Server ────────────────────────────────────────────

async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`[quarterscope] MCP server v${SERVER_VERSION} started`);
}

main().catch((error) => {
  console.error('[quarterscope] Fatal error:', error);
  process.exit(1);
});
