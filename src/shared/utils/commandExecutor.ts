import {spawn} from 'node:child_process';
import {MAX_DIFF_BYTES, SUBPROCESS_SHORT_TIMEOUT, SUBPROCESS_TIMEOUT} from '../../constants.js';

export interface CommandOptions {
  timeout?: number;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  maxBytes?: number;
  input?: string;
}

export interface CommandResult {
  // null when the process never ran or was killed
  code: number | null;
  stdout: string;
  stderr: string;
  overflow: boolean;
  timedOut: boolean;
  error?: string;
}

/**
 * Run a command and collect its output. Never rejects: spawn failures, timeouts and
 * output over maxBytes are reported on the result, and the child is killed on overflow.
 */
export function runCommandAsync(args: string[], opts: CommandOptions = {}): Promise<CommandResult> {
  const timeoutMs = opts.timeout ?? SUBPROCESS_TIMEOUT;
  const maxBytes = opts.maxBytes ?? MAX_DIFF_BYTES;

  return new Promise((resolve) => {
    const chunks: Buffer[] = [];
    const errChunks: Buffer[] = [];
    let received = 0;
    let overflow = false;
    let timedOut = false;
    let resolved = false;

    const child = spawn(args[0], args.slice(1), {
      cwd: opts.cwd,
      env: opts.env ?? process.env,
      stdio: [opts.input === undefined ? 'ignore' : 'pipe', 'pipe', 'pipe'],
    });

    const finish = (code: number | null, error?: string) => {
      if (resolved) return;
      resolved = true;
      clearTimeout(timer);
      child.removeAllListeners();
      child.stdout?.removeAllListeners();
      child.stderr?.removeAllListeners();
      resolve({
        code,
        stdout: overflow ? '' : Buffer.concat(chunks).toString('utf8'),
        stderr: Buffer.concat(errChunks).toString('utf8'),
        overflow,
        timedOut,
        error,
      });
    };

    const timer = setTimeout(() => {
      timedOut = true;
      child.kill('SIGKILL');
      finish(null, `timed out after ${timeoutMs}ms`);
    }, timeoutMs);

    child.on('error', (err) => finish(null, err.message));
    child.on('close', (code) => finish(code));

    child.stdout?.on('data', (chunk: Buffer) => {
      if (overflow) return;
      received += chunk.length;
      if (received > maxBytes) {
        overflow = true;
        chunks.length = 0;
        child.kill('SIGKILL');
        return;
      }
      chunks.push(chunk);
    });
    child.stderr?.on('data', (chunk: Buffer) => {
      errChunks.push(chunk);
    });

    if (opts.input !== undefined && child.stdin) {
      // EPIPE when the child exits without reading is reported through 'close'
      child.stdin.on('error', () => undefined);
      child.stdin.end(opts.input);
    }
  });
}

export function runCommandQuickAsync(args: string[], cwd?: string): Promise<CommandResult> {
  return runCommandAsync(args, {timeout: SUBPROCESS_SHORT_TIMEOUT, cwd});
}

