/**
 * Console capture for code that reports through console.*
 */

export interface CapturedOutput {
  stdout: string[];
  stderr: string[];
}

function format(args: unknown[]): string {
  return args.map((arg) => (typeof arg === "string" ? arg : String(arg))).join(" ");
}

/**
 * Run fn with console.log/info going to `stdout` and console.warn/error to `stderr`
 *
 * The original console methods are restored afterwards, including when fn throws.
 */
export async function captureConsole<T>(
  fn: () => Promise<T>
): Promise<{ result: T; output: CapturedOutput }> {
  const output: CapturedOutput = { stdout: [], stderr: [] };
  const original = {
    log: console.log,
    info: console.info,
    warn: console.warn,
    error: console.error,
  };

  console.log = (...args: unknown[]) => output.stdout.push(format(args));
  console.info = (...args: unknown[]) => output.stdout.push(format(args));
  console.warn = (...args: unknown[]) => output.stderr.push(format(args));
  console.error = (...args: unknown[]) => output.stderr.push(format(args));

  try {
    const result = await fn();
    return { result, output };
  } finally {
    console.log = original.log;
    console.info = original.info;
    console.warn = original.warn;
    console.error = original.error;
  }
}
