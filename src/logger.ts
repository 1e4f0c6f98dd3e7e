import chalk from "chalk";

/**
 * Diagnostics all go to stderr, which is where the result line belongs too.
 */

export const styleKV = (label: string, value: string | number): string =>
  `${chalk.magenta(label)}: ${chalk.white(String(value))}`;

export const logInfo = (message: string): void => {
  process.stderr.write(`${message}\n`);
};

export const logWarn = (message: string): void => {
  process.stderr.write(`${chalk.yellow("WARN")} ${message}\n`);
};

export const logError = (message: string): void => {
  process.stderr.write(`${chalk.red("ERROR")} ${message}\n`);
};
