/**
 * Console capture for command tests
 */

export type CapturedOutput<T> = {
  readonly result: T;
  readonly out: readonly string[];
  readonly err: readonly string[];
};

const join = (args: readonly unknown[]): string => args.map(String).join(" ");

/**
 * Run `fn` with console.log and console.error recorded instead of printed
 */
export const captureConsole = async <T>(
  fn: () => T | Promise<T>
): Promise<CapturedOutput<T>> => {
  const out: string[] = [];
  const err: string[] = [];
  const { log, error } = console;
  console.log = (...args: unknown[]) => {
    out.push(join(args));
  };
  console.error = (...args: unknown[]) => {
    err.push(join(args));
  };
  try {
    const result = await fn();
    return { result, out, err };
  } finally {
    console.log = log;
    console.error = error;
  }
};
