/**
 * Centralized configuration for dropwatch.
 * Logging reads LOG_LEVEL, DEBUG, NODE_ENV and DROPWATCH_LOG_FILE from the
 * process environment itself (see logger.ts); everything else is read here.
 */

import { z, ZodError } from 'zod';
import path from 'node:path';
import { loadConfigSync } from 'zod-config';
import { envAdapter } from 'zod-config/env-adapter';
import { dotEnvAdapter } from 'zod-config/dotenv-adapter';
import { ConfigurationError, getErrorMessage, toError } from './errors.js';
import { resolveCommand } from './path-utils.js';

// ============================================================================
// Schema Definitions
// ============================================================================

const splitList = (val: string): string[] =>
  val
    .split(',')
    .map(s => s.trim())
    .filter(s => s.length > 0);

const optionalString = z
  .string()
  .optional()
  .transform(val => (val ? val : undefined));

/**
 * Required settings: what to watch and what to run
 */
const coreSchema = z.object({
  DROPWATCH_DIR: z.string().min(1, 'DROPWATCH_DIR must name the directory to watch').describe('Directory to watch'),
  DROPWATCH_PIPELINE: z.string().min(1, 'DROPWATCH_PIPELINE must name the pipeline entry point').describe('Pipeline entry point'),
  DROPWATCH_INTERPRETER: optionalString.describe('Interpreter used to launch the pipeline entry point'),
});

/**
 * Event filtering and write-finish detection
 */
const watcherSchema = z.object({
  DROPWATCH_IGNORE_SUFFIXES: z
    .string()
    .default(':Zone.Identifier')
    .transform(splitList)
    .describe('Comma-separated filename suffixes that are never dispatched'),
  DROPWATCH_EXTENSIONS: z
    .string()
    .default('')
    .transform(splitList)
    .describe('Comma-separated extensions to dispatch; empty means all'),
  DROPWATCH_STABILITY_MS: z.coerce.number().int().nonnegative().default(2000).describe('Size stability window before a write counts as finished'),
  DROPWATCH_POLL_MS: z.coerce.number().int().positive().default(100).describe('Poll interval while waiting for a write to finish'),
});

export const configSchema = z.object({
  ...coreSchema.shape,
  ...watcherSchema.shape,
});

export type RawConfig = z.infer<typeof configSchema>;

// ============================================================================
// Configuration Loading
// ============================================================================

export interface AppConfig {
  /** Absolute path of the watched directory */
  directory: string;
  pipeline: {
    entry: string;
    interpreter?: string;
  };
  filter: {
    ignoreSuffixes: string[];
    extensions: string[];
  };
  writeFinish: {
    stabilityThreshold: number;
    pollInterval: number;
  };
}

/** Values that take precedence over every other source, e.g. CLI flags */
export type ConfigOverrides = Partial<Record<keyof RawConfig, string>>;

function formatIssues(error: ZodError): string {
  return error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('\n');
}

export function toAppConfig(raw: RawConfig): AppConfig {
  return {
    directory: path.resolve(raw.DROPWATCH_DIR),
    pipeline: {
      entry: resolveCommand(raw.DROPWATCH_PIPELINE),
      interpreter: raw.DROPWATCH_INTERPRETER && resolveCommand(raw.DROPWATCH_INTERPRETER),
    },
    filter: {
      ignoreSuffixes: raw.DROPWATCH_IGNORE_SUFFIXES,
      extensions: raw.DROPWATCH_EXTENSIONS,
    },
    writeFinish: {
      stabilityThreshold: raw.DROPWATCH_STABILITY_MS,
      pollInterval: raw.DROPWATCH_POLL_MS,
    },
  };
}

/**
 * Load and validate configuration from `.env.local`, `.env`, the process
 * environment and finally `overrides`, later sources winning.
 */
export function loadConfig(overrides: ConfigOverrides = {}): AppConfig {
  const customEnv: Record<string, string> = {};
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) customEnv[key] = value;
  }

  try {
    const raw = loadConfigSync({
      schema: configSchema,
      adapters: [
        dotEnvAdapter({ path: path.join(process.cwd(), '.env.local'), silent: true }),
        dotEnvAdapter({ path: path.join(process.cwd(), '.env'), silent: true }),
        envAdapter({ silent: true }),
        envAdapter({ customEnv, silent: true }),
      ],
    });
    return toAppConfig(raw);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ConfigurationError(`Configuration validation failed:\n${formatIssues(error)}`, { cause: error });
    }
    throw new ConfigurationError(`Could not load configuration: ${getErrorMessage(error)}`, { cause: toError(error) });
  }
}
