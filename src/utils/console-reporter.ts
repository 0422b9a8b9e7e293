import chalk from 'chalk';

/**
 * Operator-facing output. Diagnostics go to the winston logger instead.
 */
export interface ProgressReporter {
  progress(message: string): void;
  count(label: string, value: number | string): void;
  success(message: string): void;
  error(message: string): void;
}

export class ConsoleReporter implements ProgressReporter {
  constructor(private readonly write: (line: string) => void = line => console.log(line)) {}

  progress(message: string): void {
    this.write(chalk.green(message));
  }

  count(label: string, value: number | string): void {
    this.write(`${label}: ${chalk.yellow(String(value))}`);
  }

  success(message: string): void {
    this.write(chalk.green(message));
  }

  error(message: string): void {
    this.write(chalk.red(message));
  }
}

/**
 * Reporter that drops everything; used where no operator is watching
 */
export const silentReporter: ProgressReporter = {
  progress: () => undefined,
  count: () => undefined,
  success: () => undefined,
  error: () => undefined
};
