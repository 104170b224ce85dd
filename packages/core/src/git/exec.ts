import { spawn } from 'child_process';
import { constants } from 'os';
import type { ExecCommand, ExecOptions, ExecResult } from './types';

/** Shell convention for a process killed by a signal */
function signalExitCode(signal: NodeJS.Signals | null): number {
  const entry = Object.entries(constants.signals).find(([name]) => name === signal);
  return entry ? 128 + entry[1] : 1;
}

/**
 * Creates an ExecCommand that spawns processes, feeds `options.input` to
 * stdin and kills the child once `options.timeout` elapses.
 *
 * Spawn failures resolve with exit code 1 and the error message on stderr.
 * A child killed by a signal resolves with 128 + the signal number (124 for
 * a timeout) and the signal named on stderr.
 */
export function createExecCommand(defaultCwd: string = process.cwd()): ExecCommand {
  return (command: string, args: string[], options?: ExecOptions): Promise<ExecResult> => {
    return new Promise<ExecResult>((resolve) => {
      const proc = spawn(command, args, {
        cwd: options?.cwd || defaultCwd,
        env: { ...process.env, ...options?.env },
        stdio: ['pipe', 'pipe', 'pipe'],
      });

      let stdout = '';
      let stderr = '';
      let timedOut = false;
      let timer: NodeJS.Timeout | undefined;

      if (options?.timeout && options.timeout > 0) {
        timer = setTimeout(() => {
          timedOut = true;
          proc.kill('SIGKILL');
        }, options.timeout);
      }

      proc.stdout.on('data', (data: Buffer) => { stdout += data.toString(); });
      proc.stderr.on('data', (data: Buffer) => { stderr += data.toString(); });

      // EPIPE when the child exits before reading all of its input
      proc.stdin.on('error', (error: Error) => {
        stderr += `${stderr && !stderr.endsWith('\n') ? '\n' : ''}stdin: ${error.message}\n`;
      });

      proc.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
        if (timer) clearTimeout(timer);
        if (code !== null) {
          resolve({ exitCode: code, stdout, stderr, timedOut });
          return;
        }
        const killed = `${stderr && !stderr.endsWith('\n') ? '\n' : ''}Killed by ${signal ?? 'unknown signal'}\n`;
        resolve({
          exitCode: timedOut ? 124 : signalExitCode(signal),
          stdout,
          stderr: stderr + killed,
          timedOut,
        });
      });

      proc.on('error', (error: Error) => {
        if (timer) clearTimeout(timer);
        resolve({ exitCode: 1, stdout, stderr: error.message, timedOut });
      });

      if (options?.input !== undefined) {
        proc.stdin.write(options.input);
      }
      proc.stdin.end();
    });
  };
}
