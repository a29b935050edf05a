import { execFile } from 'child_process';
import { promisify } from 'util';
import type { ExecCommand, ExecOptions, ExecResult } from './scan_executor';

const execFileAsync = promisify(execFile);

/** Scanner output can run to tens of megabytes */
const MAX_OUTPUT_BYTES = 256 * 1024 * 1024;

function field(error: unknown, key: 'code' | 'stdout' | 'stderr' | 'message'): unknown {
  if (typeof error === 'object' && error !== null && key in error) {
    return Reflect.get(error, key);
  }
  return undefined;
}

function asText(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

/**
 * Creates an ExecCommand backed by child_process.execFile. Arguments are
 * passed straight to the program, never through a shell.
 * A non-zero exit is reported in the result rather than thrown.
 */
export function createExecCommand(): ExecCommand {
  return async (command: string, args: string[], options?: ExecOptions): Promise<ExecResult> => {
    try {
      const { stdout, stderr } = await execFileAsync(command, args, {
        cwd: options?.cwd,
        env: { ...process.env, ...options?.env },
        maxBuffer: MAX_OUTPUT_BYTES,
      });
      return { exitCode: 0, stdout, stderr };
    } catch (error) {
      const code = field(error, 'code');
      return {
        // A string code (ENOENT) means the program never started
        exitCode: typeof code === 'number' ? code : 127,
        stdout: asText(field(error, 'stdout')),
        stderr: asText(field(error, 'stderr')) || asText(field(error, 'message')),
      };
    }
  };
}
