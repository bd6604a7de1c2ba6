import chalk from "chalk";

// An empty NO_COLOR counts as unset (https://no-color.org)
const noColor = (process.env.NO_COLOR ?? "") !== "";

export function colorize(fn: (s: string) => string, text: string): string {
  return noColor ? text : fn(text);
}

/** Status tags for per-tool and per-agent result lines. */
export const tag = {
  ok: (): string => colorize(chalk.green, "[OK]"),
  skip: (reason: string): string => colorize(chalk.dim, `[SKIP] ${reason}`),
  fail: (message: string): string => `${colorize(chalk.red, "[FAIL]")} ${message}`,
};

export const log = {
  info: (msg: string) => console.log(colorize(chalk.blue, "ℹ") + " " + msg),
  success: (msg: string) => console.log(colorize(chalk.green, "✓") + " " + msg),
  warn: (msg: string) => console.log(colorize(chalk.yellow, "⚠") + " " + msg),
  error: (msg: string) => console.error(colorize(chalk.red, "✗") + " " + msg),
  dim: (msg: string) => console.log(colorize(chalk.dim, msg)),
  heading: (msg: string) => console.log(colorize(chalk.bold, msg)),
  /** Indented bullet, used for skill and catalog listings */
  item: (msg: string) => console.log(`  ${colorize(chalk.cyan, "-")} ${msg}`),
};
