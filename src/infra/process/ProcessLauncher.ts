import { spawn } from 'node:child_process';
import type { Readable } from 'node:stream';

export interface ProcessExit {
  code: number | null;
  signal: NodeJS.Signals | null;
}

/**
 * Handle on a launched local process; `exited` rejects when it cannot be started
 */
export interface ProcessHandle {
  readonly stdout: Readable;
  readonly stderr: Readable;
  readonly exited: Promise<ProcessExit>;
  kill(signal: NodeJS.Signals): void;
}

export interface LaunchOptions {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

export type ProcessLauncher = (file: string, args: string[], options?: LaunchOptions) => ProcessHandle;

export const spawnProcess: ProcessLauncher = (file, args, options = {}) => {
  const child = spawn(file, args, {
    cwd: options.cwd,
    env: options.env ?? process.env,
    stdio: ['ignore', 'pipe', 'pipe'],
  });

  const { stdout, stderr } = child;
  if (!stdout || !stderr) {
    child.kill('SIGKILL');
    throw new Error(`Failed to open output pipes for ${file}`);
  }

  const exited = new Promise<ProcessExit>((resolve, reject) => {
    child.once('error', reject);
    child.once('close', (code, signal) => resolve({ code, signal }));
  });

  return {
    stdout,
    stderr,
    exited,
    kill(signal) {
      if (child.exitCode === null && child.signalCode === null) {
        child.kill(signal);
      }
    },
  };
};
