/**
 * Churnline Configuration Management
 *
 * Loads configuration from .churnlinerc (YAML) with environment variable
 * overrides and defaults. The merged result is validated with zod, so every
 * consumer receives a fully typed, range-checked configuration.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (CHURNLINE_*, PORT, HOST, LOG_LEVEL)
 * 3. Config file (.churnlinerc or --config path)
 * 4. Default values
 *
 * @module cli/lib/config
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import type { LogLevel } from '../../core/utils/logger.js';

// ============================================================================
// Schema
// ============================================================================

const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

const ScorerSchema = z.object({
  command: z.string().min(1),
  args: z.array(z.string()),
  cwd: z.string().min(1).optional(),
  timeoutMs: z.number().int().positive(),
  killGraceMs: z.number().int().nonnegative(),
});

const PipelineSchema = z.object({
  fallbackEnabled: z.boolean(),
});

const SimulatorSchema = z.object({
  seed: z.number().int(),
  jitter: z.number().min(0).max(0.25),
});

const ServerSchema = z.object({
  port: z.number().int().min(0).max(65535),
  host: z.string().min(1),
  corsOrigins: z.array(z.string()),
  maxBodyBytes: z.number().int().positive(),
});

const ConfigSchema = z.object({
  version: z.literal(1),
  scorer: ScorerSchema,
  pipeline: PipelineSchema,
  simulator: SimulatorSchema,
  server: ServerSchema,
  logLevel: LogLevelSchema,
});

/**
 * Shape of .churnlinerc; every key optional, unknown keys rejected
 */
const ConfigFileSchema = z
  .object({
    version: z.literal(1),
    scorer: ScorerSchema.partial().strict(),
    pipeline: PipelineSchema.partial().strict(),
    simulator: SimulatorSchema.partial().strict(),
    server: ServerSchema.partial().strict(),
    logLevel: LogLevelSchema,
  })
  .partial()
  .strict();

type ConfigFile = z.infer<typeof ConfigFileSchema>;

export type ScorerConfig = z.infer<typeof ScorerSchema>;
export type ServerConfig = z.infer<typeof ServerSchema>;

export interface ChurnlineConfig extends z.infer<typeof ConfigSchema> {
  /** Config file that was loaded, if any */
  readonly configPath: string | null;
}

// ============================================================================
// Errors
// ============================================================================

export class ConfigError extends Error {
  public override readonly name = 'ConfigError' as const;
  public readonly code = 'CONFIG_INVALID' as const;

  constructor(
    message: string,
    public readonly problems: readonly string[] = []
  ) {
    super(problems.length > 0 ? `${message}: ${problems.join('; ')}` : message);
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError;
}

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_CONFIG: Omit<ChurnlineConfig, 'configPath'> = {
  version: 1,
  scorer: {
    command: 'python3',
    args: ['score.py', '--input', '{input}', '--output', '{output}'],
    timeoutMs: 30000,
    killGraceMs: 2000,
  },
  pipeline: {
    fallbackEnabled: true,
  },
  simulator: {
    seed: 42,
    jitter: 0.05,
  },
  server: {
    port: 8081,
    host: '0.0.0.0',
    corsOrigins: ['*'],
    maxBodyBytes: 10 * 1024 * 1024,
  },
  logLevel: 'info',
};

// ============================================================================
// Configuration Loading
// ============================================================================

const CONFIG_FILE_NAMES = ['.churnlinerc', '.churnlinerc.yaml', '.churnlinerc.yml', '.churnlinerc.json'];

/**
 * Find config file in the start directory or its parents
 */
function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    const parent = dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

function parseConfigFile(filePath: string): ConfigFile {
  let content: unknown;
  try {
    // YAML is a superset of JSON, so this covers .churnlinerc.json too
    content = parseYaml(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Could not parse config file ${filePath}`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  // An empty file parses to null
  const result = ConfigFileSchema.safeParse(content ?? {});
  if (!result.success) {
    throw new ConfigError(`Invalid config file ${filePath}`, formatIssues(result.error));
  }
  return result.data;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Typed access to the environment layer
 */
class EnvReader {
  constructor(private readonly env: NodeJS.ProcessEnv) {}

  string(name: string): string | undefined {
    const value = this.env[name];
    return value === undefined || value.trim() === '' ? undefined : value.trim();
  }

  number(name: string): number | undefined {
    const value = this.string(name);
    if (value === undefined) return undefined;
    const num = Number(value);
    if (!Number.isFinite(num)) {
      throw new ConfigError(`Environment variable ${name} must be a number`, [`got '${value}'`]);
    }
    return num;
  }

  bool(name: string): boolean | undefined {
    const value = this.string(name)?.toLowerCase();
    if (value === undefined) return undefined;
    if (value === 'true' || value === '1' || value === 'yes') return true;
    if (value === 'false' || value === '0' || value === 'no') return false;
    throw new ConfigError(`Environment variable ${name} must be a boolean`, [`got '${value}'`]);
  }

  list(name: string, separator: RegExp): string[] | undefined {
    return this.string(name)
      ?.split(separator)
      .map((part) => part.trim())
      .filter((part) => part !== '');
  }
}

/**
 * CLI flag overrides
 */
export interface ConfigOverrides {
  readonly scorerCommand?: string;
  readonly scorerArgs?: readonly string[];
  readonly timeoutMs?: number;
  readonly fallbackEnabled?: boolean;
  readonly seed?: number;
  readonly port?: number;
  readonly host?: string;
  readonly logLevel?: LogLevel;
}

export interface LoadConfigOptions {
  /** Explicit config file path */
  readonly configPath?: string;
  /** Directory the config file search starts from */
  readonly cwd?: string;
  /** Environment to read (defaults to process.env) */
  readonly env?: NodeJS.ProcessEnv;
  readonly overrides?: ConfigOverrides;
}

/**
 * Load and merge configuration from all sources
 *
 * @throws ConfigError when the file or the merged result is invalid
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<ChurnlineConfig> {
  const env = new EnvReader(options.env ?? process.env);
  const cwd = options.cwd ?? process.cwd();
  const overrides = options.overrides ?? {};

  let configPath: string | null = null;
  let fileConfig: ConfigFile = {};

  const explicitPath = options.configPath ?? env.string('CHURNLINE_CONFIG');
  if (explicitPath !== undefined) {
    configPath = resolve(cwd, explicitPath);
    if (!existsSync(configPath)) {
      throw new ConfigError(`Config file not found: ${configPath}`);
    }
    fileConfig = parseConfigFile(configPath);
  } else {
    configPath = findConfigFile(cwd);
    if (configPath) {
      fileConfig = parseConfigFile(configPath);
    }
  }

  // Relative scorer directories in the file are relative to the file
  const fileScorerCwd =
    fileConfig.scorer?.cwd !== undefined && configPath !== null
      ? resolve(dirname(configPath), fileConfig.scorer.cwd)
      : fileConfig.scorer?.cwd;

  const merged = {
    version: fileConfig.version ?? DEFAULT_CONFIG.version,

    scorer: {
      command:
        overrides.scorerCommand ??
        env.string('CHURNLINE_SCORER_COMMAND') ??
        fileConfig.scorer?.command ??
        DEFAULT_CONFIG.scorer.command,
      args: [
        ...(overrides.scorerArgs ??
          env.list('CHURNLINE_SCORER_ARGS', /\s+/) ??
          fileConfig.scorer?.args ??
          DEFAULT_CONFIG.scorer.args),
      ],
      cwd: env.string('CHURNLINE_SCORER_CWD') ?? fileScorerCwd ?? DEFAULT_CONFIG.scorer.cwd,
      timeoutMs:
        overrides.timeoutMs ??
        env.number('CHURNLINE_TIMEOUT_MS') ??
        fileConfig.scorer?.timeoutMs ??
        DEFAULT_CONFIG.scorer.timeoutMs,
      killGraceMs:
        env.number('CHURNLINE_KILL_GRACE_MS') ??
        fileConfig.scorer?.killGraceMs ??
        DEFAULT_CONFIG.scorer.killGraceMs,
    },

    pipeline: {
      fallbackEnabled:
        overrides.fallbackEnabled ??
        env.bool('CHURNLINE_FALLBACK') ??
        fileConfig.pipeline?.fallbackEnabled ??
        DEFAULT_CONFIG.pipeline.fallbackEnabled,
    },

    simulator: {
      seed:
        overrides.seed ??
        env.number('CHURNLINE_SIMULATOR_SEED') ??
        fileConfig.simulator?.seed ??
        DEFAULT_CONFIG.simulator.seed,
      jitter:
        env.number('CHURNLINE_SIMULATOR_JITTER') ??
        fileConfig.simulator?.jitter ??
        DEFAULT_CONFIG.simulator.jitter,
    },

    server: {
      port: overrides.port ?? env.number('PORT') ?? fileConfig.server?.port ?? DEFAULT_CONFIG.server.port,
      host: overrides.host ?? env.string('HOST') ?? fileConfig.server?.host ?? DEFAULT_CONFIG.server.host,
      corsOrigins: [
        ...(env.list('CHURNLINE_CORS_ORIGINS', /,/) ??
          fileConfig.server?.corsOrigins ??
          DEFAULT_CONFIG.server.corsOrigins),
      ],
      maxBodyBytes:
        env.number('CHURNLINE_MAX_BODY_BYTES') ??
        fileConfig.server?.maxBodyBytes ??
        DEFAULT_CONFIG.server.maxBodyBytes,
    },

    logLevel:
      overrides.logLevel ??
      env.string('LOG_LEVEL')?.toLowerCase() ??
      fileConfig.logLevel ??
      DEFAULT_CONFIG.logLevel,
  };

  const result = ConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigError('Invalid configuration', formatIssues(result.error));
  }

  return { ...result.data, configPath };
}
