#!/usr/bin/env node

/**
 * Quarterscope CLI
 *
 * Generate dataset reports from the command line.
 *
 * Usage:
 *   quarterscope growth [--source transactions|insurance] [--measure count|amount]
 *                       [--states goa,kerala] [--limit 20]
 *   quarterscope transactions [--states ...]
 *   quarterscope devices
 *   quarterscope insurance [--states ...]
 *   quarterscope categories [--states ...] [--categories ...]
 *   quarterscope engagement [--states ...]
 *   quarterscope status
 */

import { existsSync } from 'node:fs';
import { readSettings, resolveDatasetPath } from './config/settings.js';
import { resolveConfigDir, settingsPath } from './config/paths.js';
import { resolveThresholds } from './config/thresholds.js';
import { DatasetStore } from './dataset/dataset-store.js';
import { createReportRunner, type ReportRunner } from './orchestrator/report-runner.js';
import { parseArgs, flagsToReportArgs } from './commands/parse-args.js';
import { formatErrorMessage } from './validators.js';

// ─── Commands ───────────────────────────────────────────────

type ReportCommand = (runner: ReportRunner, args: Record<string, unknown>) => string;

const REPORT_COMMANDS = new Map<string, ReportCommand>([
  ['growth', (runner, args) => runner.growth(args)],
  ['transactions', (runner, args) => runner.transactions(args)],
  ['devices', (runner) => runner.devices()],
  ['insurance', (runner, args) => runner.insurance(args)],
  ['categories', (runner, args) => runner.categories(args)],
  ['engagement', (runner, args) => runner.engagement(args)],
]);

function runReport(command: string, flags: Record<string, string>): string | null {
  const report = REPORT_COMMANDS.get(command);
  if (!report) return null;

  const settings = readSettings();
  const datasetPath = resolveDatasetPath(settings);
  if (!existsSync(datasetPath)) {
    throw new Error(
      `Dataset not found at ${datasetPath}. Set QUARTERSCOPE_DB or dataset.path in ${settingsPath()}`
    );
  }

  const store = new DatasetStore(datasetPath);
  try {
    return report(createReportRunner(store, settings), flagsToReportArgs(flags));
  } finally {
    store.close();
  }
}

function runStatus(): string {
  const settings = readSettings();
  const datasetPath = resolveDatasetPath(settings);
  const thresholds = resolveThresholds(settings.report.thresholds);

  const lines: string[] = [];
  lines.push('Quarterscope Status');
  lines.push('');
  lines.push(`  Config directory:  ${resolveConfigDir()}`);
  lines.push(`  Settings file:     ${existsSync(settingsPath()) ? settingsPath() : '(defaults)'}`);
  lines.push(`  Dataset:           ${datasetPath}`);
  lines.push(`  Dataset found:     ${existsSync(datasetPath) ? 'yes' : 'no'}`);
  lines.push(`  Growth table rows: ${settings.report.limit}`);
  lines.push(`  Surge threshold:   +${thresholds.surgePercent}%`);
  lines.push(`  Decline threshold: -${thresholds.declinePercent}%`);
  return lines.join('\n');
}

// ─── Help ───────────────────────────────────────────────────

const GENERAL_HELP = `quarterscope — quarterly growth reports for payments data

  Usage:
    quarterscope <command> [options]

  Commands:
    growth          Quarter-over-quarter growth by state
    transactions    Transaction count and amount by state and quarter
    devices         Registered users by device brand
    insurance       Insurance policies by state and quarter
    categories      Yearly transaction amount per category
    engagement      App opens against registered users by state
    status          Show configuration and dataset location
    help <command>  Show help for a command

  Environment:
    QUARTERSCOPE_DB     Path to the dataset database
    QUARTERSCOPE_HOME   Config directory (default: ~/.quarterscope)`;

const COMMAND_HELP: Record<string, string> = {
  growth: `quarterscope growth — Quarter-over-quarter Growth

  Compare every state's quarter against the quarter before it. Q1 is
  compared against Q4 of the previous year; a missing previous quarter
  leaves growth empty. Rows are ranked by growth percentage.

  Usage:
    quarterscope growth [options]

  Options:
    --source <name>         transactions (default) or insurance
    --measure <name>        count (default) or amount
    --states <a,b,...>      Only these states
    --limit <n>             Maximum table rows (default from settings)

  Examples:
    quarterscope growth
    quarterscope growth --source insurance --measure amount --limit 10`,

  transactions: `quarterscope transactions — Transaction Totals

  Usage:
    quarterscope transactions [--states <a,b,...>]`,

  devices: `quarterscope devices — Device Brand Usage

  Usage:
    quarterscope devices`,

  insurance: `quarterscope insurance — Insurance Policies

  Usage:
    quarterscope insurance [--states <a,b,...>]`,

  categories: `quarterscope categories — Category Trends

  Usage:
    quarterscope categories [--states <a,b,...>] [--categories <a,b,...>]`,

  engagement: `quarterscope engagement — User Engagement

  Usage:
    quarterscope engagement [--states <a,b,...>]`,

  status: `quarterscope status — Show Configuration Status

  Usage:
    quarterscope status`,
};

function showHelp(topic?: string): string {
  if (topic) {
    return COMMAND_HELP[topic] ?? `Unknown command: ${topic}\n\n${GENERAL_HELP}`;
  }
  return GENERAL_HELP;
}

// ─── Main ───────────────────────────────────────────────────

function main(): void {
  const { command, flags } = parseArgs(process.argv);

  try {
    let output: string;

    switch (command) {
      case 'status':
        output = runStatus();
        break;
      case 'help':
      case '--help':
      case '-h':
        output = showHelp();
        break;
      default: {
        if (command.startsWith('help-')) {
          output = showHelp(command.slice(5));
          break;
        }
        const report = runReport(command, flags);
        if (report === null) {
          console.error(`Unknown command: ${command}\n`);
          output = showHelp();
        } else {
          output = report;
        }
      }
    }

    console.log(output);
  } catch (error) {
    console.error(`[quarterscope] Error: ${formatErrorMessage(error)}`);
    process.exit(1);
  }
}

main();
