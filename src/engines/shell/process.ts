import { spawn } from 'node:child_process';
import { ClientLaunchError, ClientNotFoundError } from '../../errors/index.js';

export interface ProcessOutcome {
  exitCode: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

export type ProcessLauncher = (command: string, args: string[], timeoutMs: number) => Promise<ProcessOutcome>;

/**
 * Spawns a client process and waits for it to exit. When the wall-clock budget runs out the
 * process is killed and the outcome is flagged `timedOut`.
 */
export const spawnProcess: ProcessLauncher = (command, args, timeoutMs) =>
  new Promise((resolve, reject) => {
    const child = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    let timedOut = false;

    const timer = setTimeout(() => {
      timedOut = true;
      child.kill('SIGKILL');
    }, timeoutMs);

    child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));

    child.on('error', (error: NodeJS.ErrnoException) => {
      clearTimeout(timer);
      reject(error.code === 'ENOENT' ? new ClientNotFoundError(command) : new ClientLaunchError(command, error.code));
    });

    child.on('close', code => {
      clearTimeout(timer);
      resolve({
        exitCode: code ?? -1,
        stdout: Buffer.concat(stdout).toString('utf-8'),
        stderr: Buffer.concat(stderr).toString('utf-8'),
        timedOut,
      });
    });
  });
