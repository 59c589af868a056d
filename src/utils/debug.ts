import chalk from "chalk";

let enabled = process.env.DEBUG === "true";

/** Turns debug output on; the `DEBUG=true` environment switch stays on regardless. */
export function enableDebug(on: boolean): void {
  enabled = enabled || on;
}

export function debug(message: string, ...details: unknown[]): void {
  if (enabled) {
    console.log(chalk.gray(`[debug] ${message}`), ...details);
  }
}
