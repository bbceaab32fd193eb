/**
 * commands/index.ts: Commander program, configured and exported without .parse().
 *
 * Imported by:
 *   src/bin/stig-extract.ts
 */

import { Command } from 'commander';
import { createExtractCommand, consoleIo, type CliIo } from './extract.js';

/**
 * Build the program. `extract` is the default command, so
 * `stig-extract <path>` and `stig-extract extract <path>` are the same.
 */
export function createProgram(
  io: CliIo = consoleIo,
  onExit?: (code: number) => void,
  env?: Record<string, string | undefined>,
): Command {
  const program = new Command()
    .name('stig-extract')
    .description('Extract DISA STIG rules (id, severity, title, description, check, fix) from XCCDF documents.')
    .version('0.1.0');

  program.addCommand(createExtractCommand(io, onExit, env), { isDefault: true });

  return program;
}
