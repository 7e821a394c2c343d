import type { Logger, LevelWithSilent } from 'pino';
import type { SumcheckConfig, VerificationStatus } from '@sumcheck/core';

/** Process-facing side of the CLI, swapped out in tests */
export interface CliIO {
  /** Write one line of result output */
  print(line: string): void;
  /** Record the status the process should exit with */
  setStatus(status: VerificationStatus): void;
  createLogger(level: LevelWithSilent): Logger;
}

/** Everything a command needs for one run */
export interface CliContext {
  config: SumcheckConfig;
  logger: Logger;
  print(line: string): void;
  setStatus(status: VerificationStatus): void;
}

/** Options accepted before or after any sub-command */
export type GlobalOptions = {
  progress: boolean;
  logLevel?: LevelWithSilent;
};
