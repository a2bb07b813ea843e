import chalk from "chalk";
import { ApiRequestError, describeCause } from "../api/core/errors";
import { ConfigError } from "../config";

/**
 * Wraps a Commander.js action handler with centralized error handling.
 *
 * Catches errors thrown by the action, formats them consistently,
 * and calls process.exit(1).
 */
export function withErrorHandler<T extends unknown[]>(
  fn: (...args: T) => Promise<void>,
): (...args: T) => Promise<void> {
  return async (...args: T) => {
    try {
      await fn(...args);
    } catch (error) {
      if (error instanceof ApiRequestError) {
        if (error.code === "HTTP_ERROR") {
          console.error(chalk.red(`✗ ${error.status}: ${error.message}`));
        } else {
          console.error(chalk.red(`✗ ${error.message}`));
        }
      } else if (error instanceof ConfigError) {
        console.error(chalk.red(`✗ ${error.message}`));
        console.error(chalk.dim("  Run: camper configure"));
      } else if (error instanceof Error) {
        console.error(chalk.red(`✗ ${error.message}`));
      } else {
        console.error(chalk.red("✗ An unexpected error occurred"));
      }

      if (error instanceof Error) {
        const cause = describeCause(error);
        if (cause) {
          console.error(chalk.dim(`  Cause: ${cause}`));
        }
      }

      process.exit(1);
    }
  };
}
