import { spawn, spawnSync } from 'child_process';

export interface RunCommandOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface CommandResult {
  code: number;
  stdout: string;
  stderr: string;
}

export type CommandRunner = (cmd: string, args: string[], opts: RunCommandOptions) => Promise<CommandResult>;

/**
 * Run a command to completion. Resolves with the exit code (non-zero included);
 * rejects on spawn errors (e.g. ENOENT), timeout, or abort.
 */
export async function runCommand(cmd: string, args: string[], opts: RunCommandOptions): Promise<CommandResult> {
  return await new Promise((resolve, reject) => {
    if (opts.signal?.aborted) {
      reject(new Error(`Command aborted before start: ${cmd}`));
      return;
    }

    const child = spawn(cmd, args, { stdio: ['ignore', 'pipe', 'pipe'] });
    let stdout = '';
    let stderr = '';

    const onAbort = (): void => {
      clearTimeout(timeoutId);
      child.kill('SIGKILL');
      reject(new Error(`Command aborted: ${cmd}`));
    };

    const timeoutId = setTimeout(() => {
      opts.signal?.removeEventListener('abort', onAbort);
      child.kill('SIGKILL');
      reject(new Error(`Command timed out after ${opts.timeoutMs}ms: ${cmd}`));
    }, opts.timeoutMs);

    opts.signal?.addEventListener('abort', onAbort, { once: true });

    child.stdout.on('data', (d) => (stdout += d.toString()));
    child.stderr.on('data', (d) => (stderr += d.toString()));

    child.on('error', (e) => {
      clearTimeout(timeoutId);
      opts.signal?.removeEventListener('abort', onAbort);
      reject(e);
    });

    child.on('close', (code) => {
      clearTimeout(timeoutId);
      opts.signal?.removeEventListener('abort', onAbort);
      resolve({ code: code ?? 1, stdout, stderr });
    });
  });
}

export function hasCommandOnPath(cmd: string, versionFlag = '-version'): boolean {
  try {
    const check = spawnSync(cmd, [versionFlag], { stdio: 'ignore' });
    return check.status === 0;
  } catch {
    return false;
  }
}

/** True for the error spawn raises when the executable does not exist. */
export function isMissingExecutable(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
