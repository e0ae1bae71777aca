import chalk from 'chalk';

export const logger = {
  info(msg: string) {
    console.log(chalk.blue('ℹ'), msg);
  },

  success(msg: string) {
    console.log(chalk.green('✔'), msg);
  },

  warn(msg: string) {
    console.log(chalk.yellow('⚠'), msg);
  },

  error(msg: string) {
    console.error(chalk.red('✖'), msg);
  },

  debug(msg: string) {
    if (process.env.DEBUG) {
      console.log(chalk.gray('⚙'), chalk.gray(msg));
    }
  },

  header(msg: string) {
    console.log();
    console.log(chalk.bold(msg));
    console.log();
  },

  dim(msg: string) {
    console.log(chalk.dim(msg));
  },

  numbered(items: readonly string[]) {
    const width = String(items.length).length;
    items.forEach((item, i) => {
      console.log(chalk.dim(`  ${String(i + 1).padStart(width)}.`), item);
    });
  },
};

export type Logger = typeof logger;

/** The slice of the logger that pipeline stages report progress through. */
export type ProgressReporter = Pick<Logger, 'info' | 'success' | 'warn' | 'debug'>;
