import { spawn } from 'child_process';
import type { ChildProcessByStdio } from 'child_process';
import type { Readable } from 'stream';

export const DEFAULT_TIMEOUT = 30000;
const KILL_TIMEOUT = 5000;

export interface CommandOptions {
  cwd?: string;
  timeout?: number;
}

/**
 * Execute a command without a shell and resolve with its trimmed stdout
 */
export function executeCommand(command: string[], options: CommandOptions = {}): Promise<string> {
  const timeout = options.timeout ?? DEFAULT_TIMEOUT;

  return new Promise((resolve, reject) => {
    const [cmd, ...args] = command;
    if (!cmd) {
      reject(new Error('Command array is empty'));
      return;
    }

    let child: ChildProcessByStdio<null, Readable, Readable>;
    try {
      child = spawn(cmd, args, {
        cwd: options.cwd ?? process.cwd(),
        env: process.env,
        stdio: ['ignore', 'pipe', 'pipe'],
        shell: false,
      });
    } catch (error) {
      reject(
        new Error(
          `Failed to spawn ${cmd}: ${error instanceof Error ? error.message : String(error)}`
        )
      );
      return;
    }

    let stdout = '';
    let stderr = '';
    let timedOut = false;

    const timer = setTimeout(() => {
      timedOut = true;
      child.kill('SIGTERM');
      const killTimer = setTimeout(() => {
        if (!child.killed) {
          child.kill('SIGKILL');
        }
      }, KILL_TIMEOUT);
      killTimer.unref();
    }, timeout);
    timer.unref();

    child.stdout.on('data', (data: Buffer) => {
      stdout += data.toString();
    });

    child.stderr.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    child.on('close', (code: number | null) => {
      clearTimeout(timer);
      if (timedOut) {
        reject(new Error(`Command timed out after ${timeout}ms: ${command.join(' ')}`));
      } else if (code === 0) {
        resolve(stdout.trim());
      } else {
        const errorMessage = stderr.trim() || `Command failed with code ${code}`;
        reject(new Error(`${cmd} failed: ${errorMessage}`));
      }
    });

    child.on('error', (error: Error) => {
      clearTimeout(timer);
      reject(new Error(`Failed to execute ${cmd}: ${error.message}`));
    });
  });
}

/**
 * Look a command up on PATH with `which` (`where` on Windows)
 * @returns the first match, or undefined when the command is not on PATH
 */
export async function which(
  name: string,
  options: CommandOptions = {}
): Promise<string | undefined> {
  const finder = process.platform === 'win32' ? 'where' : 'which';
  try {
    const output = await executeCommand([finder, name], options);
    const first = output.split(/\r?\n/)[0]?.trim();
    return first ? first : undefined;
  } catch {
    return undefined;
  }
}
