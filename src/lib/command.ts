import { spawn } from 'node:child_process';

export interface CommandOptions {
  bin: string;
  args: string[];
  timeoutMs?: number;
  signal?: AbortSignal;
}

export type CommandFailureKind = 'spawn' | 'exit' | 'timeout' | 'aborted';

export class CommandError extends Error {
  readonly kind: CommandFailureKind;
  readonly exitCode: number | null;
  readonly stderr: string;

  constructor(
    kind: CommandFailureKind,
    message: string,
    options: { exitCode?: number | null; stderr?: string; cause?: unknown } = {}
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'CommandError';
    this.kind = kind;
    this.exitCode = options.exitCode ?? null;
    this.stderr = options.stderr ?? '';
  }
}

/** Runs a command and resolves with its stdout */
export type CommandRunner = (options: CommandOptions) => Promise<string>;

/**
 * Run a process with argv (no shell). Resolves with stdout on exit code 0.
 * The child is killed when the timeout elapses or the signal aborts.
 */
export const runCommand: CommandRunner = ({ bin, args, timeoutMs, signal }) => {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CommandError('aborted', `${bin} not started: operation aborted`));
      return;
    }

    const child = spawn(bin, args, { stdio: ['ignore', 'pipe', 'pipe'] });
    let stdout = '';
    let stderr = '';
    let settled = false;

    const finish = (error: CommandError | null) => {
      if (settled) return;
      settled = true;
      if (timer) clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
      if (error) {
        reject(error);
      } else {
        resolve(stdout);
      }
    };

    const onAbort = () => {
      child.kill('SIGKILL');
      finish(new CommandError('aborted', `${bin} aborted`, { stderr, cause: signal?.reason }));
    };

    const timer = timeoutMs
      ? setTimeout(() => {
          child.kill('SIGKILL');
          finish(new CommandError('timeout', `${bin} timed out after ${timeoutMs}ms`, { stderr }));
        }, timeoutMs)
      : null;

    signal?.addEventListener('abort', onAbort, { once: true });

    child.stdout.on('data', (data: Buffer) => {
      stdout += data.toString();
    });
    child.stderr.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    child.on('error', (err) => {
      finish(new CommandError('spawn', `Failed to start ${bin}`, { cause: err }));
    });

    child.on('close', (code) => {
      if (code === 0) {
        finish(null);
      } else {
        finish(
          new CommandError('exit', `${bin} exited with code ${code}: ${stderr.trim()}`, {
            exitCode: code,
            stderr,
          })
        );
      }
    });
  });
};
