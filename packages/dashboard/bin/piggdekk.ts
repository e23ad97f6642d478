#!/usr/bin/env tsx
/**
 * piggdekk CLI Entry Point
 *
 * Terminal front end for the studded-tire support dashboard: KPIs and the
 * municipality table for a county/support selection, the map points as
 * GeoJSON, and the public municipality registry.
 *
 * @module piggdekk-cli
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

import { loadConfig, validateConfig, type CLIConfig } from '../src/cli/lib/config.js';
import { createCLILogger, type CLILogger } from '../src/cli/lib/logger.js';
import { EXIT_CODES, type CommandIO, type CommandResult } from '../src/cli/lib/command.js';
import { printError, printOutput } from '../src/cli/lib/output.js';
import { SupportDashboard } from '../src/dashboard/support-dashboard.js';
import {
  runCounties,
  runMap,
  runRegistry,
  runReport,
  type MapOptions,
  type RegistryCommandOptions,
  type ReportOptions,
} from '../src/cli/commands/index.js';

// ============================================================================
// Global State
// ============================================================================

interface GlobalOptions {
  readonly verbose?: boolean;
  readonly json?: boolean;
  readonly config?: string;
  readonly dataDir?: string;
}

export interface GlobalContext {
  config: CLIConfig;
  logger: CLILogger;
  dashboard: SupportDashboard;
  startTime: number;
}

let globalContext: GlobalContext | null = null;

function getGlobalContext(): GlobalContext {
  if (!globalContext) {
    throw new Error('Global context not initialized. Call initializeContext first.');
  }
  return globalContext;
}

// ============================================================================
// CLI Setup
// ============================================================================

const PackageJsonSchema = z.object({ version: z.string() });

function getVersion(): string {
  const __dirname = dirname(fileURLToPath(import.meta.url));
  const packageJsonPath = join(__dirname, '..', 'package.json');
  try {
    const parsed = PackageJsonSchema.safeParse(JSON.parse(readFileSync(packageJsonPath, 'utf-8')));
    return parsed.success ? parsed.data.version : '0.0.0';
  } catch {
    return '0.0.0';
  }
}

function initializeContext(options: GlobalOptions): GlobalContext {
  const startTime = Date.now();

  const config = loadConfig({
    configPath: options.config,
    overrides: {
      verbose: options.verbose,
      json: options.json,
      dataDir: options.dataDir,
    },
  });
  validateConfig(config);

  const logger = createCLILogger({
    level: config.verbose ? 'debug' : 'info',
    json: config.json,
  });

  const dashboard = new SupportDashboard({
    dataDir: config.paths.data,
    supportFile: config.paths.supportFile,
    contactsFile: config.paths.contactsFile,
  });

  logger.debug('Configuration loaded', {
    configPath: config.configPath,
    dataDir: config.paths.data,
  });

  globalContext = { config, logger, dashboard, startTime };
  return globalContext;
}

function commandIO(logger: CLILogger): CommandIO {
  return {
    logger,
    out: printOutput,
    err: (text) => console.error(text),
  };
}

function finish(result: CommandResult): void {
  if (!result.success) process.exit(result.exitCode);
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  return Number.isInteger(parsed) ? parsed : NaN;
}

function createProgram(): Command {
  const program = new Command();

  program
    .name('piggdekk')
    .description('Municipal support schemes for switching away from studded tires')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .option('-v, --verbose', 'Enable verbose output')
    .option('--json', 'Output logs as JSON (machine-readable)')
    .option('--config <path>', 'Path to config file (default: .piggdekkrc)')
    .option('--data-dir <dir>', 'Directory holding the CSV files (default: ./data)')
    .hook('preAction', (thisCommand) => {
      try {
        initializeContext(thisCommand.opts<GlobalOptions>());
      } catch (error) {
        printError(`Configuration error: ${error instanceof Error ? error.message : String(error)}`);
        process.exit(EXIT_CODES.CONFIG_ERROR);
      }
    });

  program
    .command('report')
    .description('KPIs and municipality table for a selection')
    .option('--county <name>', 'County to show (All for every county)')
    .option('--support <label>', "Support filter: 'All' | 'With support' | 'Without support'")
    .option('--format <fmt>', 'Output format: table|json|csv', 'table')
    .action(async (options: ReportOptions) => {
      const { logger, dashboard } = getGlobalContext();
      finish(await runReport(options, { ...commandIO(logger), dashboard }));
    });

  program
    .command('counties')
    .description('List the county options')
    .action(async () => {
      const { config, logger, dashboard } = getGlobalContext();
      finish(await runCounties({ json: config.json }, { ...commandIO(logger), dashboard }));
    });

  program
    .command('map')
    .description('Supported municipalities as GeoJSON points')
    .option('--county <name>', 'County to show (All for every county)')
    .option('--support <label>', "Support filter: 'All' | 'With support' | 'Without support'")
    .option('--out <file>', 'Write the GeoJSON to a file instead of stdout')
    .action(async (options: MapOptions) => {
      const { logger, dashboard } = getGlobalContext();
      finish(await runMap(options, { ...commandIO(logger), dashboard }));
    });

  program
    .command('registry')
    .description('Fetch the public municipality registry')
    .option('--format <fmt>', 'Output format: table|json|csv', 'table')
    .option('--limit <n>', 'Max rows to print', parseInteger)
    .action(async (options: RegistryCommandOptions) => {
      const { config, logger } = getGlobalContext();
      finish(
        await runRegistry(options, {
          ...commandIO(logger),
          registry: {
            url: config.services.registry.baseUrl,
            timeoutMs: config.services.registry.timeout,
          },
        })
      );
    });

  return program;
}

// ============================================================================
// Main Entry Point
// ============================================================================

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    if (globalContext) {
      globalContext.logger.error('Command failed', {
        error: error instanceof Error ? error.message : String(error),
        duration_ms: Date.now() - globalContext.startTime,
      });
    } else {
      printError(error instanceof Error ? error.message : String(error));
    }
    process.exit(EXIT_CODES.ERRORS);
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(EXIT_CODES.ERRORS);
});
