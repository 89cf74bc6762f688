import { Injectable } from '@nestjs/common';
import { spawn } from 'child_process';

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  duration: number;
  timedOut: boolean;
}

export interface CommandOptions {
  /** milliseconds; 0 disables the limit */
  timeout?: number;
  maxOutputSize?: number;
}

/**
 * Runs an external program and collects its output. A non-zero exit is
 * reported in the result; only a failure to spawn rejects.
 */
@Injectable()
export class CommandRunner {
  run(command: string, args: string[], options: CommandOptions = {}): Promise<CommandResult> {
    const { timeout = 300000, maxOutputSize = 10 * 1024 * 1024 } = options;

    const startTime = Date.now();
    let timedOut = false;

    return new Promise<CommandResult>((resolve, reject) => {
      const child = spawn(command, args, {
        env: process.env,
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      let stdout = '';
      let stderr = '';

      let killTimer: NodeJS.Timeout | undefined;
      const timeoutId = timeout > 0
        ? setTimeout(() => {
          timedOut = true;
          child.kill('SIGTERM');
          killTimer = setTimeout(() => child.kill('SIGKILL'), 10000);
        }, timeout)
        : undefined;

      child.stdout?.on('data', (data: Buffer) => {
        if (stdout.length < maxOutputSize) stdout += data.toString();
      });
      child.stderr?.on('data', (data: Buffer) => {
        if (stderr.length < maxOutputSize) stderr += data.toString();
      });

      child.on('close', (code, signal) => {
        clearTimeout(timeoutId);
        clearTimeout(killTimer);
        resolve({
          exitCode: code ?? (signal ? 128 : 1),
          stdout,
          stderr,
          duration: Date.now() - startTime,
          timedOut,
        });
      });

      child.on('error', (error) => {
        clearTimeout(timeoutId);
        clearTimeout(killTimer);
        reject(error);
      });
    });
  }
}
