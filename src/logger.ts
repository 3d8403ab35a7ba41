const RED = 31;
const CYAN = 36;

/**
 * Wraps text in an ANSI color, or returns it untouched in a browser
 */
function colorize(text: string, color: number): string {
  if ('window' in globalThis) {
    return text;
  }
  return `\x1b[${color}m${text}\x1b[0m`;
}

/**
 * JSON.stringify that replaces repeated object references with "[Circular]"
 */
function safeStringify(data: object): string {
  const seen = new WeakSet<object>();
  return JSON.stringify(
    data,
    (_key, value: unknown) => {
      if (typeof value === 'object' && value !== null) {
        if (seen.has(value)) {
          return '[Circular]';
        }
        seen.add(value);
      }
      return value;
    },
    2
  );
}

/**
 * Logs a titled block of data. Objects are pretty-printed as JSON.
 */
export function logData(title: string = '', data?: unknown): void {
  console.log('');
  console.log(colorize(`== ${title} ==`, CYAN));
  if (!data) {
    return;
  }
  if (typeof data === 'object') {
    console.log(safeStringify(data));
  } else {
    console.log(data);
  }
}

/**
 * Logs an error with its stack trace and cause
 * @param error - The error to log. Non-Error values are written to stderr
 * @param title - Optional heading printed above the error
 */
export function logError(error: unknown, title?: string): void {
  if (!(error instanceof Error)) {
    console.error(colorize(String(error), RED));
    return;
  }

  if (title) {
    console.log('');
    console.log(`== ${title} ==`);
  }
  console.log(colorize(error.stack || error.message, RED));

  const cause: unknown = error.cause;
  if (cause) {
    console.log('');
    console.log(colorize('== Error Cause ==', RED));
    if (cause instanceof Error) {
      console.log(colorize(cause.stack || cause.message, RED));
    } else {
      console.log(colorize(JSON.stringify(cause, null, 2), RED));
    }
  }
}
