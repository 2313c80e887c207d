#!/usr/bin/env tsx
/**
 * Churnline CLI Entry Point
 *
 * Serve the prediction API, validate customer files, score them once, and
 * produce sample data.
 *
 * @module churnline-cli
 */

import { Command, InvalidArgumentError } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

import { runCommand } from '../src/cli/commands/run.js';
import { sampleCommand } from '../src/cli/commands/sample.js';
import { serveCommand } from '../src/cli/commands/serve.js';
import { validateCommand } from '../src/cli/commands/validate.js';
import { isConfigError, loadConfig, type ChurnlineConfig, type ConfigOverrides } from '../src/cli/lib/config.js';
import { EXIT_CODES } from '../src/cli/lib/exit-codes.js';
import { errorMessage } from '../src/core/errors.js';
import { isLogLevel, setLogLevel } from '../src/core/utils/logger.js';

// ============================================================================
// Global State
// ============================================================================

type GlobalOptions = {
  readonly config?: string;
  readonly verbose?: boolean;
  readonly logLevel?: string;
};

let activeConfig: ChurnlineConfig | null = null;

function getConfig(): ChurnlineConfig {
  if (!activeConfig) {
    throw new Error('Configuration not loaded. The preAction hook must run first.');
  }
  return activeConfig;
}

// ============================================================================
// CLI Setup
// ============================================================================

function getVersion(): string {
  const packageJsonPath = join(dirname(fileURLToPath(import.meta.url)), '..', 'package.json');
  try {
    const parsed = z.object({ version: z.string() }).safeParse(JSON.parse(readFileSync(packageJsonPath, 'utf-8')));
    return parsed.success ? parsed.data.version : '0.0.0';
  } catch {
    return '0.0.0';
  }
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

/**
 * Config overrides carried by the invoked command's own flags
 */
function commandOverrides(options: Readonly<Record<string, unknown>>): ConfigOverrides {
  return {
    port: typeof options.port === 'number' ? options.port : undefined,
    host: typeof options.host === 'string' ? options.host : undefined,
    timeoutMs: typeof options.timeout === 'number' ? options.timeout : undefined,
    // commander sets `fallback: true` unless --no-fallback is given
    fallbackEnabled: options.fallback === false ? false : undefined,
    scorerCommand: typeof options.scorer === 'string' ? options.scorer : undefined,
  };
}

function createProgram(): Command {
  const program = new Command();

  program
    .name('churnline')
    .description('Churnline - churn prediction pipeline with an external scoring process')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .option('-v, --verbose', 'Enable debug logging')
    .option('--log-level <level>', 'Log level: debug|info|warn|error')
    .option('--config <path>', 'Path to config file (default: .churnlinerc)')
    .hook('preAction', async (thisCommand, actionCommand) => {
      const global = thisCommand.opts<GlobalOptions>();
      if (global.logLevel !== undefined && !isLogLevel(global.logLevel)) {
        console.error(`Configuration error: invalid log level '${global.logLevel}'`);
        process.exit(EXIT_CODES.CONFIG_ERROR);
      }

      let config: ChurnlineConfig;
      try {
        config = await loadConfig({
          configPath: global.config,
          overrides: {
            ...commandOverrides(actionCommand.opts()),
            logLevel: global.verbose ? 'debug' : isLogLevel(global.logLevel) ? global.logLevel : undefined,
          },
        });
      } catch (error) {
        console.error(`Configuration error: ${errorMessage(error)}`);
        process.exit(EXIT_CODES.CONFIG_ERROR);
      }
      activeConfig = config;
      setLogLevel(config.logLevel);
    });

  program
    .command('serve')
    .description('Start the HTTP API server')
    .option('-p, --port <n>', 'Port to listen on', parseInteger)
    .option('--host <host>', 'Interface to bind')
    .option('--scorer <command>', 'Scoring process executable')
    .option('--no-fallback', 'Fail runs instead of simulating when the scoring process fails')
    .action(async () => {
      process.exitCode = await serveCommand(getConfig());
    });

  program
    .command('validate <csv>')
    .description('Validate a customer CSV without scoring it')
    .option('--json', 'Output as JSON')
    .action(async (file: string, options: { json?: boolean }) => {
      process.exitCode = await validateCommand(file, { json: options.json });
    });

  program
    .command('run <csv>')
    .description('Score a customer CSV once')
    .option('--demo', 'Simulate scores instead of running the scoring process')
    .option('--no-fallback', 'Exit with an error instead of simulating when the scoring process fails')
    .option('--timeout <ms>', 'Scoring process timeout in milliseconds', parseInteger)
    .option('--scorer <command>', 'Scoring process executable')
    .option('-o, --out <file>', 'Write predictions CSV to file')
    .option('--json', 'Output as JSON')
    .action(async (file: string, options: { demo?: boolean; out?: string; json?: boolean }) => {
      process.exitCode = await runCommand(file, getConfig(), {
        demo: options.demo,
        out: options.out,
        json: options.json,
      });
    });

  program
    .command('sample')
    .description('Write a sample customer CSV')
    .option('-n, --rows <n>', 'Number of customers', parseInteger)
    .option('--seed <n>', 'Random seed', parseInteger)
    .option('-o, --out <file>', 'Write to file instead of stdout')
    .action(async (options: { rows?: number; seed?: number; out?: string }) => {
      process.exitCode = await sampleCommand(options);
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
    if (isConfigError(error)) {
      console.error(`Configuration error: ${error.message}`);
      process.exit(EXIT_CODES.CONFIG_ERROR);
    }
    console.error(`Error: ${errorMessage(error)}`);
    process.exit(EXIT_CODES.ERRORS);
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(EXIT_CODES.ERRORS);
});
