import { Command } from 'commander';
import { loadConfig, type HarnessConfig } from './config.js';
import { EnvironmentError } from './errors.js';
import { HttpTaskApi, type TaskApi } from './http/task-client.js';
import { renderReport } from './report/report-renderer.js';
import { loadTableRenderer, type TableRenderer } from './report/table.js';
import { runSuite } from './suite/orchestrator.js';
import type { OutputSink } from './types.js';

export const VERSION = '1.0.0';

const BANNER_WIDTH = 120;
const TABLE_NOTE = "Note: install 'cli-table3' for grid table formatting";

// ANSI color codes
const COLORS = {
  reset: '\x1b[0m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
};

export interface HarnessOptions {
  verbose?: boolean;
  env?: Record<string, string | undefined>;
  output?: OutputSink;
  errorOutput?: OutputSink;
  createApi?: (config: HarnessConfig) => TaskApi;
  loadTable?: () => Promise<TableRenderer>;
}

/**
 * Run the whole harness and resolve with the process exit code.
 */
export async function runHarness(
  options: HarnessOptions = {},
): Promise<number> {
  const output = options.output ?? ((line: string) => console.log(line));
  const errorOutput =
    options.errorOutput ?? ((line: string) => console.error(line));

  try {
    const config = loadConfig(options.env);
    const table = await (options.loadTable ?? loadTableRenderer)();
    const api = options.createApi
      ? options.createApi(config)
      : new HttpTaskApi(config);

    const rule = '='.repeat(BANNER_WIDTH);
    output(rule);
    output('TASK MANAGEMENT API - TEST SUITE');
    output(rule);
    output(`Base URL: ${config.baseUrl}`);
    output(`Mode: ${options.verbose ? 'Verbose' : 'Summary'}`);
    if (!table.rich) {
      output(`${COLORS.yellow}${TABLE_NOTE}${COLORS.reset}`);
    }
    output(rule);

    const outcome = await runSuite({
      api,
      verbose: options.verbose,
      output,
    });

    output(
      renderReport(outcome.results, table, {
        blockedSlots: outcome.missingSlots,
      }),
    );
    return outcome.exitCode;
  } catch (error) {
    if (error instanceof EnvironmentError) {
      errorOutput(
        `\n${COLORS.red}ERROR: Cannot connect to API server${COLORS.reset}`,
      );
      errorOutput(`Reason: ${error.reason}`);
      errorOutput(`Please ensure the server is running on ${error.baseUrl}`);
      return 1;
    }

    errorOutput(
      `Error: ${error instanceof Error ? error.message : String(error)}`,
    );
    return 1;
  }
}

export function createProgram(
  overrides: Omit<HarnessOptions, 'verbose'> = {},
): Command {
  const program = new Command();

  program
    .name('task-api-harness')
    .description(
      'Run a fixed CRUD scenario against a task-management HTTP API',
    )
    .version(VERSION)
    .option('-v, --verbose', 'Print each test result as it runs')
    .action(async (options: { verbose?: boolean }) => {
      const exitCode = await runHarness({
        ...overrides,
        verbose: options.verbose,
      });
      process.exitCode = exitCode;
    });

  return program;
}
