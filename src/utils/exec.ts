import { execFileSync } from 'child_process';

export type ExecFileFn = (
  file: string,
  args: readonly string[],
  options: { timeout: number },
) => string;

/** Runs a binary without a shell and returns its stdout. Throws on non-zero exit or timeout. */
export const execTool: ExecFileFn = (file, args, options) =>
  execFileSync(file, args, {
    encoding: 'utf-8',
    stdio: ['ignore', 'pipe', 'pipe'],
    timeout: options.timeout,
  });

export function stderrOf(err: unknown): string {
  if (typeof err === 'object' && err !== null && 'stderr' in err) {
    const { stderr } = err;
    if (typeof stderr === 'string' || Buffer.isBuffer(stderr)) return String(stderr).trim();
  }
  return '';
}
