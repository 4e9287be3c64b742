import { type CommandResult, errorMessage, failure, type ICommandRunner, type Logger, type StepResult } from '@tfcanvas/contracts';
import { execFile } from 'node:child_process';
import fs from 'node:fs/promises';
import util from 'node:util';

export interface ProcessOutput {
  stdout: string;
  stderr: string;
}

/**
 * Runs a binary to completion and buffers its output.
 * Rejects like child_process.execFile: `code` is the exit code, or a string when the binary could not start.
 */
export type ProcessExecutor = (file: string, args: string[], options: { cwd: string }) => Promise<ProcessOutput>;

const execFileAsync = util.promisify(execFile);

export const execFileExecutor: ProcessExecutor = async (file, args, options) => {
  const { stdout, stderr } = await execFileAsync(file, args, { cwd: options.cwd, encoding: 'utf8', maxBuffer: 64 * 1024 * 1024 });
  return { stdout, stderr };
};

export interface TerraformRunnerOptions {
  workingDir: string;
  logger: Logger;
  terraformBin?: string;
  executor?: ProcessExecutor;
}

interface ExecFailure {
  code?: unknown;
  stdout?: unknown;
  stderr?: unknown;
}

function asExecFailure(error: unknown): ExecFailure {
  if (typeof error !== 'object' || error === null) return {};
  return {
    code: 'code' in error ? error.code : undefined,
    stdout: 'stdout' in error ? error.stdout : undefined,
    stderr: 'stderr' in error ? error.stderr : undefined,
  };
}

export class TerraformRunner implements ICommandRunner {
  readonly workingDir: string;
  private readonly terraformBin: string;
  private readonly logger: Logger;
  private readonly executor: ProcessExecutor;

  constructor(options: TerraformRunnerOptions) {
    this.workingDir = options.workingDir;
    this.terraformBin = options.terraformBin ?? 'terraform';
    this.logger = options.logger;
    this.executor = options.executor ?? execFileExecutor;
  }

  /** Never rejects: a binary that cannot be started yields exit code 1 with the error text as stderr */
  async run(subcommand: string, args: string[], cwd: string = this.workingDir): Promise<CommandResult> {
    const commandLine = [this.terraformBin, subcommand, ...args].join(' ');
    this.logger.info(`Running: ${commandLine}`);

    try {
      await fs.mkdir(cwd, { recursive: true });
      const { stdout, stderr } = await this.executor(this.terraformBin, [subcommand, ...args], { cwd });
      this.logger.debug('Command completed successfully');
      return { exitCode: 0, stdout, stderr };
    } catch (error) {
      const exec = asExecFailure(error);

      if (typeof exec.code === 'number') {
        this.logger.error(`Command failed with code ${exec.code}`);
        return {
          exitCode: exec.code,
          stdout: typeof exec.stdout === 'string' ? exec.stdout : '',
          stderr: typeof exec.stderr === 'string' ? exec.stderr : '',
        };
      }

      const message = errorMessage(error);
      this.logger.error(`Error running Terraform command: ${message}`);
      return { exitCode: 1, stdout: '', stderr: message, failure: failure('ProcessExecutionError', message) };
    }
  }

  private async step(subcommand: string, extraArgs: string[] = []): Promise<StepResult> {
    const { exitCode, stdout, stderr } = await this.run(subcommand, ['-no-color', ...extraArgs]);
    return { success: exitCode === 0, message: exitCode === 0 ? stdout : stderr };
  }

  init(): Promise<StepResult> {
    return this.step('init');
  }

  plan(): Promise<StepResult> {
    return this.step('plan');
  }

  apply(autoApprove: boolean = false): Promise<StepResult> {
    return this.step('apply', autoApprove ? ['-auto-approve'] : []);
  }

  destroy(autoApprove: boolean = false): Promise<StepResult> {
    return this.step('destroy', autoApprove ? ['-auto-approve'] : []);
  }
}
