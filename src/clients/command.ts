/**
 * Command runner for CLI collaborators (charmcraft, snapcraft, the QA lab CLI).
 *
 * Commands always run with a timeout. A non-zero exit or a timeout becomes
 * a typed error chosen by the caller, so test-service failures and
 * promotion failures stay distinguishable in the logs.
 */

import execa from 'execa';
import { commandFailedError, TypedError } from '../domain/errors';
import { logger } from '../logger';

export interface CommandOutput {
  stdout: string;
  stderr: string;
}

/** Runs a command and resolves with its output, or rejects with a ReleaseError. */
export interface CommandRunner {
  run(command: string, args: string[], options?: { cwd?: string }): Promise<CommandOutput>;
}

export interface ExecaCommandRunnerOptions {
  timeoutMs: number;
  /** Wrap the typed failure in the error class the caller reports. */
  toError: (failure: TypedError) => Error;
}

const log = logger.child({ module: 'command' });

export class ExecaCommandRunner implements CommandRunner {
  constructor(private readonly options: ExecaCommandRunnerOptions) {}

  async run(command: string, args: string[], options: { cwd?: string } = {}): Promise<CommandOutput> {
    log.debug('Executing command', { command, args, cwd: options.cwd });

    const result = await execa(command, args, {
      cwd: options.cwd,
      timeout: this.options.timeoutMs,
      reject: false,
    });

    if (result.exitCode !== 0 || result.timedOut || result.failed) {
      const failure = commandFailedError(
        command,
        args,
        result.exitCode,
        result.stderr,
        result.timedOut,
      );
      log.error('Command failed', { command, subcommand: args[0], exitCode: result.exitCode, stderr: result.stderr });
      throw this.options.toError(failure);
    }

    return { stdout: result.stdout, stderr: result.stderr };
  }
}
