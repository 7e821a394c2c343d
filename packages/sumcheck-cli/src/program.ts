/**
 * Builds the sumcheck command tree.
 *
 * Kept separate from the entry point so tests can drive the program with
 * their own output and status sinks.
 */

import { Command, Option } from 'commander';
import { LOG_LEVELS, buildConfig } from '@sumcheck/core';
import { registerFileCommand } from './commands/file.js';
import { registerManifestCommand } from './commands/manifest.js';
import { banner } from './ui.js';
import type { CliContext, CliIO, GlobalOptions } from './types.js';

export function createProgram(io: CliIO, version: string): Command {
  const program = new Command();

  program
    .name('sumcheck')
    .description('Verify files against MD5 checksums')
    .version(version)
    .option('--no-progress', 'omit the (i/n p%) prefix on manifest results')
    .addOption(
      new Option('--log-level <level>', 'diagnostic log level on stderr').choices(LOG_LEVELS)
    )
    .addHelpText('beforeAll', banner())
    .showHelpAfterError()
    // Throw CommanderError instead of exiting; the entry point maps it to an exit status
    .exitOverride();

  const getContext = (): CliContext => {
    const opts = program.opts<GlobalOptions>();
    const config = buildConfig({
      ...(opts.logLevel ? { logLevel: opts.logLevel } : {}),
      // --no-progress only ever turns progress off; otherwise SUMCHECK_PROGRESS decides
      ...(opts.progress === false ? { showProgress: false } : {}),
    });

    return {
      config,
      logger: io.createLogger(config.logLevel),
      print: (line) => io.print(line),
      setStatus: (status) => io.setStatus(status),
    };
  };

  registerFileCommand(program, getContext);
  registerManifestCommand(program, getContext);

  return program;
}
