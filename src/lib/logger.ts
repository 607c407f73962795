import chalk from "chalk";

/**
 * Logger utility with bracketed, coloured prefixes
 */
export const log = {
  /**
   * [INFO] - Informational messages
   */
  info: (message: string): void => {
    console.log(chalk.cyan("[INFO]"), message);
  },

  /**
   * [ERROR] - Error messages
   */
  error: (message: string): void => {
    console.error(chalk.red("[ERROR]"), message);
  },

  /**
   * [WARN] - Warning messages
   */
  warn: (message: string): void => {
    console.warn(chalk.yellow("[WARN]"), message);
  },

  /**
   * [OK] - Success messages
   */
  ok: (message: string): void => {
    console.log(chalk.green("[OK]"), message);
  },

  separator: (char: string = "="): void => {
    console.log(char.repeat(42));
  },

  blank: (): void => {
    console.log();
  },

  /**
   * Print raw output (banners, command output)
   */
  raw: (message: string): void => {
    console.log(message);
  },
};
