/**
 * Colored terminal output for diagnostics on stderr.
 * Colors are on when FORCE_COLOR is set, off when NO_COLOR is set, and
 * otherwise follow whether stderr is a TTY.
 */

const CODES = {
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  reset: "\x1b[0m",
} as const;

function shouldUseColors(): boolean {
  if (process.env.FORCE_COLOR !== undefined && process.env.FORCE_COLOR !== "") {
    return true;
  }
  if (process.env.NO_COLOR !== undefined) {
    return false;
  }
  return process.stderr.isTTY === true;
}

function createColorFn(code: string): (text: string) => string {
  return (text: string): string =>
    shouldUseColors() ? `${code}${text}${CODES.reset}` : text;
}

export const colors = {
  /** Errors */
  red: createColorFn(CODES.red),
  /** Warnings */
  yellow: createColorFn(CODES.yellow),
} as const;
