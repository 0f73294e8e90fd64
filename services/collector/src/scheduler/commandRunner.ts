import { spawn } from 'node:child_process';

export type CommandResult = {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
};

export type RunCommandOptions = {
  timeoutMs: number;
  env?: NodeJS.ProcessEnv;
};

export type CommandInvoker = (command: string, args: string[], options: RunCommandOptions) => Promise<CommandResult>;

/** Spawns `command` and buffers its output; never rejects. */
export const spawnCommand: CommandInvoker = (command, args, options) =>
  new Promise((resolve) => {
    const child = spawn(command, args, {
      env: options.env ?? process.env,
      timeout: options.timeoutMs,
      killSignal: 'SIGKILL',
      stdio: ['ignore', 'pipe', 'pipe']
    });

    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    let settled = false;

    const finish = (exitCode: number | null, timedOut: boolean, extraError?: string) => {
      if (settled) {
        return;
      }
      settled = true;
      const errorText = Buffer.concat(stderr).toString('utf8');
      resolve({
        exitCode,
        stdout: Buffer.concat(stdout).toString('utf8'),
        stderr: extraError ? `${errorText}\n${extraError}`.trim() : errorText,
        timedOut
      });
    };

    child.stdout.on('data', (chunk: Buffer) => {
      stdout.push(chunk);
    });

    child.stderr.on('data', (chunk: Buffer) => {
      stderr.push(chunk);
    });

    child.on('error', (err) => {
      finish(null, false, err.message);
    });

    child.on('close', (code, signal) => {
      finish(code, signal === 'SIGKILL' && code === null);
    });
  });
