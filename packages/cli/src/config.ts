import { ConfigurationError, isLogLevel, type LogLevel } from '@stig-extract/shared';

/**
 * Default CLI configuration.
 */
export const DEFAULT_CLI_CONFIG = {
  previewLimit: 5,
  json: false,
  logLevel: 'warn',
} as const;

/**
 * Environment variables the CLI reads.
 */
export const CLI_ENV = {
  DOCUMENT_PATH: 'STIG_XCCDF_PATH',
  PREVIEW_LIMIT: 'STIG_PREVIEW_LIMIT',
  LOG_LEVEL: 'STIG_LOG_LEVEL',
} as const;

/**
 * Values given on the command line.
 */
export interface CliFlags {
  /** Positional document path */
  path?: string;
  /** Raw --limit value */
  limit?: string;
  /** --json */
  json?: boolean;
  /** Raw --log-level value */
  logLevel?: string;
}

/**
 * Resolved CLI configuration.
 */
export interface CliConfig {
  documentPath: string;
  previewLimit: number;
  json: boolean;
  logLevel: LogLevel;
  /** Sources that contributed to this config */
  sources: ('default' | 'env' | 'flag')[];
}

/**
 * Build the CLI configuration by merging:
 * 1. Defaults
 * 2. Environment variables
 * 3. Command-line flags
 *
 * The merge follows precedence: flag > env > default. There is no
 * default document path.
 *
 * @throws ConfigurationError when no document path is given or a value is invalid
 */
export function resolveCliConfig(
  flags: CliFlags,
  env: Record<string, string | undefined> = process.env,
): CliConfig {
  const sources: CliConfig['sources'] = ['default'];
  const addSource = (source: 'env' | 'flag'): void => {
    if (!sources.includes(source)) {
      sources.push(source);
    }
  };

  let documentPath: string | undefined;
  let previewLimit: number = DEFAULT_CLI_CONFIG.previewLimit;
  let json: boolean = DEFAULT_CLI_CONFIG.json;
  let logLevel: LogLevel = DEFAULT_CLI_CONFIG.logLevel;

  // Environment
  const envPath = env[CLI_ENV.DOCUMENT_PATH];
  if (envPath) {
    documentPath = envPath;
    addSource('env');
  }
  const envLimit = env[CLI_ENV.PREVIEW_LIMIT];
  if (envLimit) {
    previewLimit = parseLimit(envLimit, CLI_ENV.PREVIEW_LIMIT);
    addSource('env');
  }
  const envLevel = env[CLI_ENV.LOG_LEVEL];
  if (envLevel) {
    logLevel = parseLogLevel(envLevel, CLI_ENV.LOG_LEVEL);
    addSource('env');
  }

  // Flags
  if (flags.path) {
    documentPath = flags.path;
    addSource('flag');
  }
  if (flags.limit !== undefined) {
    previewLimit = parseLimit(flags.limit, '--limit');
    addSource('flag');
  }
  if (flags.json !== undefined) {
    json = flags.json;
    addSource('flag');
  }
  if (flags.logLevel !== undefined) {
    logLevel = parseLogLevel(flags.logLevel, '--log-level');
    addSource('flag');
  }

  if (!documentPath) {
    throw new ConfigurationError(
      `No XCCDF document given: pass a path or set ${CLI_ENV.DOCUMENT_PATH}`,
    );
  }

  return { documentPath, previewLimit, json, logLevel, sources };
}

function parseLimit(raw: string, origin: string): number {
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigurationError(`${origin} must be a non-negative integer, got "${raw}"`, { origin });
  }
  return value;
}

function parseLogLevel(raw: string, origin: string): LogLevel {
  const value = raw.trim().toLowerCase();
  if (!isLogLevel(value)) {
    throw new ConfigurationError(`${origin} must be one of debug, info, warn, error, got "${raw}"`, { origin });
  }
  return value;
}
