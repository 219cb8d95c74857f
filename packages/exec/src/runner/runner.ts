import { spawn } from 'child_process';
import { SubprocessError, UsageError } from '@cartwright/shared';
import { BufferedOutputAppender, LineSplitter, type OutputAppender } from '../output/appender';

export interface CommandRunOptions {
  /** Working directory of the subprocess */
  cwd?: string;
  /** Variables layered over the parent environment */
  env?: Record<string, string>;
  /** Receives stdout and stderr line by line */
  output?: OutputAppender;
}

/**
 * Spawns subprocesses and waits for them to finish.
 */
export interface CommandRunner {
  /**
   * Run `argv[0]` with the remaining arguments, streaming its output.
   * Rejects with a SubprocessError when the process cannot start or exits nonzero.
   */
  run(argv: readonly string[], options?: CommandRunOptions): Promise<void>;

  /**
   * Run `argv[0]` and resolve with its trimmed stdout.
   */
  runWithResult(argv: readonly string[], options?: Omit<CommandRunOptions, 'output'>): Promise<string>;
}

const DISCARD: OutputAppender = { append: () => {} };

function formatCommand(argv: readonly string[]): string {
  return argv.join(' ');
}

export class ProcessCommandRunner implements CommandRunner {
  async run(argv: readonly string[], options: CommandRunOptions = {}): Promise<void> {
    const output = options.output ?? DISCARD;
    await this.exec(argv, options, output, output);
  }

  async runWithResult(
    argv: readonly string[],
    options: Omit<CommandRunOptions, 'output'> = {},
  ): Promise<string> {
    const stdout = new BufferedOutputAppender();
    const stderr = new BufferedOutputAppender();
    try {
      await this.exec(argv, options, stdout, stderr);
    } catch (error: unknown) {
      if (error instanceof SubprocessError) {
        throw new SubprocessError(error.message, {
          exitCode: error.exitCode,
          command: error.command,
          cause: error.cause,
          details: { stderr: stderr.toString() },
        });
      }
      throw error;
    }
    return stdout.toString().trim();
  }

  protected exec(
    argv: readonly string[],
    options: Omit<CommandRunOptions, 'output'>,
    stdoutSink: OutputAppender,
    stderrSink: OutputAppender,
  ): Promise<void> {
    const [bin, ...args] = argv;
    if (!bin) {
      throw new UsageError('Cannot run an empty command');
    }

    const env: NodeJS.ProcessEnv = { ...process.env, ...options.env };
    const stdoutLines = new LineSplitter(stdoutSink);
    const stderrLines = new LineSplitter(stderrSink);

    return new Promise<void>((resolve, reject) => {
      let settled = false;
      const child = spawn(bin, args, {
        cwd: options.cwd,
        env,
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      child.stdout?.on('data', (chunk: Buffer) => stdoutLines.push(chunk));
      child.stderr?.on('data', (chunk: Buffer) => stderrLines.push(chunk));

      child.on('error', (err) => {
        if (settled) return;
        settled = true;
        reject(
          new SubprocessError(`Failed to start process: ${err.message}`, {
            command: argv,
            cause: err,
          }),
        );
      });

      child.on('close', (code, signal) => {
        if (settled) return;
        settled = true;
        stdoutLines.flush();
        stderrLines.flush();

        if (code === 0) {
          resolve();
          return;
        }
        const reason = code === null ? `was killed by ${signal ?? 'a signal'}` : `exited with code ${code}`;
        reject(
          new SubprocessError(`Command ${reason}: ${formatCommand(argv)}`, {
            exitCode: code,
            command: argv,
          }),
        );
      });
    });
  }
}
