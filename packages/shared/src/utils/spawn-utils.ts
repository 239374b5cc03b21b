import { spawn } from 'node:child_process';

/**
 * Outcome of a finished child process
 */
export interface SpawnResult {
  stdout: string;
  stderr: string;

  /**
   * Exit code, or null when the process was killed by a signal
   */
  code: number | null;

  signal: NodeJS.Signals | null;
}

export interface SpawnAsyncOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;

  /**
   * Kills the process when aborted; the promise rejects with an AbortError
   */
  abortSignal?: AbortSignal;

  /**
   * Kill the process with SIGTERM after this many milliseconds
   */
  timeoutMs?: number;
}

/**
 * Run a command to completion and collect its output.
 *
 * Output is buffered as bytes and decoded once as UTF-8, so multi-byte
 * characters split across chunks survive. A non-zero exit code does not
 * reject; callers inspect `code`.
 *
 * @example
 * ```typescript
 * const result = await spawnAsync('pdfinfo', ['/tmp/upload.pdf'], {
 *   abortSignal: controller.signal,
 * });
 * if (result.code !== 0) {
 *   throw new Error(result.stderr);
 * }
 * ```
 */
export function spawnAsync(
  command: string,
  args: string[],
  options: SpawnAsyncOptions = {},
): Promise<SpawnResult> {
  return new Promise((resolve, reject) => {
    const proc = spawn(command, args, {
      cwd: options.cwd,
      env: options.env,
      signal: options.abortSignal,
      timeout: options.timeoutMs,
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];

    proc.stdout?.on('data', (chunk: Buffer) => stdout.push(chunk));
    proc.stderr?.on('data', (chunk: Buffer) => stderr.push(chunk));

    proc.on('error', reject);
    proc.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
      resolve({
        stdout: Buffer.concat(stdout).toString('utf-8'),
        stderr: Buffer.concat(stderr).toString('utf-8'),
        code,
        signal,
      });
    });
  });
}
