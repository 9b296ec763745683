import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { ToolError } from './errors.js';

const execFileAsync = promisify(execFile);

const MAX_OUTPUT_BYTES = 64 * 1024 * 1024;

export interface RunOptions {
  cwd: string;
  signal: AbortSignal;
}

export interface RunResult {
  stdout: string;
  stderr: string;
}

function field(err: object, key: 'stdout' | 'stderr'): string {
  const value: unknown = Reflect.get(err, key);
  if (typeof value === 'string') return value;
  if (Buffer.isBuffer(value)) return value.toString('utf-8');
  return '';
}

/** Join stdout and stderr the way an operator would read them in a terminal. */
export function combinedOutput(stdout: string, stderr: string): string {
  return [stdout.trimEnd(), stderr.trimEnd()].filter(Boolean).join('\n');
}

/**
 * Run an external tool without a shell. Rejects with ToolError carrying the
 * combined output when the tool exits non-zero or `signal` aborts it.
 */
export async function runTool(binary: string, args: string[], opts: RunOptions): Promise<RunResult> {
  try {
    const { stdout, stderr } = await execFileAsync(binary, args, {
      cwd: opts.cwd,
      signal: opts.signal,
      maxBuffer: MAX_OUTPUT_BYTES,
      encoding: 'utf-8',
    });
    return { stdout, stderr };
  } catch (err) {
    if (opts.signal.aborted) {
      const output = typeof err === 'object' && err !== null
        ? combinedOutput(field(err, 'stdout'), field(err, 'stderr'))
        : '';
      throw new ToolError(`${binary}: deadline exceeded`, output, true, { cause: err });
    }
    if (typeof err === 'object' && err !== null) {
      const output = combinedOutput(field(err, 'stdout'), field(err, 'stderr'));
      const code: unknown = Reflect.get(err, 'code');
      const detail = typeof code === 'number' ? `exit status ${code}` : err instanceof Error ? err.message : String(err);
      throw new ToolError(`${binary}: ${detail}`, output, false, { cause: err });
    }
    throw new ToolError(`${binary}: ${String(err)}`, '', false, { cause: err });
  }
}
