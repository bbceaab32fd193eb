/**
 * @stig-extract/cli
 *
 * Command-line driver for STIG rule extraction.
 *
 * @packageDocumentation
 */

export { createProgram } from './commands/index.js';
export { createExtractCommand, runExtract, consoleIo, EXIT_CODES, type CliIo } from './commands/extract.js';
export { resolveCliConfig, DEFAULT_CLI_CONFIG, CLI_ENV, type CliConfig, type CliFlags } from './config.js';
export { formatPreview, formatRecord, formatFailure } from './preview.js';
