/**
 * Child-process runner for the media tools. Arguments are passed as an array
 * (no shell), stderr is kept for diagnostics, stdout is captured as raw bytes
 * so frame pixels can be piped straight back.
 */
import { spawn } from 'child_process';
import { logger } from '../utils/logger.js';

const STDERR_TAIL_CHARS = 8_000;

export interface ProcessOptions {
  /** Short name used in logs and error messages. */
  label: string;
  /** Kill the process with SIGKILL after this many milliseconds. */
  timeoutMs?: number;
}

export interface ProcessResult {
  stdout: Buffer;
  stderr: string;
}

export class ProcessError extends Error {
  constructor(
    message: string,
    public readonly label: string,
    public readonly exitCode: number | null,
    public readonly stderr: string,
    public readonly timedOut: boolean,
  ) {
    super(message);
    this.name = 'ProcessError';
  }
}

export function runProcess(
  command: string,
  args: readonly string[],
  options: ProcessOptions,
): Promise<ProcessResult> {
  const { label, timeoutMs } = options;
  logger.debug(`Process [${label}]`, { command, args: args.join(' ') });

  return new Promise((resolve, reject) => {
    const proc = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });
    const stdoutChunks: Buffer[] = [];
    let stderr = '';
    let timedOut = false;
    let settled = false;

    const timer = timeoutMs === undefined
      ? undefined
      : setTimeout(() => {
          timedOut = true;
          proc.kill('SIGKILL');
        }, timeoutMs);

    const finish = (fn: () => void) => {
      if (settled) return;
      settled = true;
      if (timer) clearTimeout(timer);
      fn();
    };

    proc.stdout.on('data', (chunk: Buffer) => { stdoutChunks.push(chunk); });
    proc.stderr.on('data', (chunk: Buffer) => {
      stderr = (stderr + chunk.toString()).slice(-STDERR_TAIL_CHARS);
    });

    proc.on('error', (err) => {
      finish(() => reject(new ProcessError(
        `${label}: failed to start ${command}: ${err.message}`, label, null, stderr, false,
      )));
    });

    proc.on('close', (code) => {
      finish(() => {
        if (timedOut) {
          reject(new ProcessError(
            `${label}: ${command} timed out after ${timeoutMs}ms`, label, code, stderr.trim(), true,
          ));
        } else if (code === 0) {
          resolve({ stdout: Buffer.concat(stdoutChunks), stderr });
        } else {
          reject(new ProcessError(
            `${label}: ${command} exited with code ${code}`, label, code, stderr.trim(), false,
          ));
        }
      });
    });
  });
}
