/**
 * stig-extract [path]: Extract STIG rules from an XCCDF document
 *
 * Prints a preview of the first records, or the full result as JSON.
 *
 * Exit codes:
 *   0  document read (with or without rules)
 *   1  document missing, malformed or unreadable
 *   2  invalid configuration
 */

import { Command } from 'commander';
import { ConfigurationError, createLogger, type Logger } from '@stig-extract/shared';
import { extractRules } from '@stig-extract/xccdf-parser';
import { CLI_ENV, DEFAULT_CLI_CONFIG, resolveCliConfig, type CliConfig, type CliFlags } from '../config.js';
import { formatFailure, formatPreview } from '../preview.js';

/**
 * Output sink, so the command can be driven from tests
 */
export interface CliIo {
  out(line: string): void;
  err(line: string): void;
}

export const consoleIo: CliIo = {
  out: (line) => {
    // eslint-disable-next-line no-console
    console.log(line);
  },
  err: (line) => {
    // eslint-disable-next-line no-console
    console.error(line);
  },
};

export const EXIT_CODES = {
  OK: 0,
  EXTRACTION_FAILED: 1,
  CONFIGURATION: 2,
} as const;

/**
 * Run one extraction with a resolved configuration and write its output.
 *
 * @returns the process exit code
 */
export function runExtract(config: CliConfig, io: CliIo, logger?: Logger): number {
  const result = extractRules(config.documentPath, {
    logger:
      logger ??
      createLogger({
        level: config.logLevel,
        prefix: 'stig-extract',
        // stdout carries only the preview or the JSON document
        write: (_level, line) => io.err(line),
      }),
  });

  if (config.json) {
    io.out(JSON.stringify(toJson(result), null, 2));
    return result.ok ? EXIT_CODES.OK : EXIT_CODES.EXTRACTION_FAILED;
  }

  if (!result.ok) {
    io.err(formatFailure(result));
    return EXIT_CODES.EXTRACTION_FAILED;
  }

  io.out(`Attempting to parse: ${result.path}`);
  io.out('');
  for (const line of formatPreview(result, config.previewLimit)) {
    io.out(line);
  }
  return EXIT_CODES.OK;
}

function toJson(result: ReturnType<typeof extractRules>): Record<string, unknown> {
  if (result.ok) {
    return {
      ok: true,
      path: result.path,
      namespace: result.namespace,
      benchmark: result.benchmark,
      fingerprint: result.fingerprint,
      count: result.records.length,
      records: result.records,
      diagnostics: result.diagnostics,
    };
  }
  return {
    ok: false,
    path: result.path,
    kind: result.kind,
    error: result.error.toJSON(),
    diagnostics: result.diagnostics,
  };
}

/**
 * Build the extract command. The action reports through `io` and
 * hands its exit code to `onExit`.
 */
export function createExtractCommand(
  io: CliIo = consoleIo,
  onExit: (code: number) => void = (code) => {
    process.exitCode = code;
  },
  env: Record<string, string | undefined> = process.env,
): Command {
  return new Command('extract')
    .description('Extract STIG rules from a DISA XCCDF document and preview them')
    .argument('[path]', `Path to the XCCDF XML document (default: $${CLI_ENV.DOCUMENT_PATH})`)
    .option('-l, --limit <n>', `Number of rules to preview (default: ${DEFAULT_CLI_CONFIG.previewLimit})`)
    .option('--json', 'Output the full result as JSON')
    .option('--log-level <level>', `Log level: debug, info, warn, error (default: ${DEFAULT_CLI_CONFIG.logLevel})`)
    .action((path: string | undefined, options: { limit?: string; json?: boolean; logLevel?: string }) => {
      const flags: CliFlags = {};
      if (path !== undefined) flags.path = path;
      if (options.limit !== undefined) flags.limit = options.limit;
      if (options.json !== undefined) flags.json = options.json;
      if (options.logLevel !== undefined) flags.logLevel = options.logLevel;

      let config: CliConfig;
      try {
        config = resolveCliConfig(flags, env);
      } catch (error) {
        if (error instanceof ConfigurationError) {
          io.err(error.message);
          onExit(EXIT_CODES.CONFIGURATION);
          return;
        }
        throw error;
      }

      onExit(runExtract(config, io));
    });
}
