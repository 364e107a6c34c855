import chalk from 'chalk';
import { isServiceOperationError, isUsageError, taskOf } from '../../lib/errors/errors.js';
import { render } from '../logger.js';

/** Exit code for a failed command. */
export const EXIT_FAILURE = 1;

function describeCause(error: Error): string | undefined {
  const cause: unknown = error.cause;
  if (cause instanceof Error) return cause.message;
  return cause === undefined ? undefined : String(cause);
}

/** Central error handler for CLI commands; prints the error and returns the exit code. */
export function handleError(error: unknown): number {
  if (isUsageError(error)) {
    render.error(error.message);
    render.hint("Run 'qvs --help' for usage");
    return EXIT_FAILURE;
  }

  if (error instanceof Error) {
    const task = taskOf(error);
    render.error(task ? `Setup task ${task} failed: ${error.message}` : error.message);
    const cause = describeCause(error);
    if (cause) render.hint(`  caused by: ${cause}`);
    if (isServiceOperationError(error)) render.hint(`  [${error.code}]`);
    return EXIT_FAILURE;
  }

  console.error(chalk.red('Unknown error:'), error);
  return EXIT_FAILURE;
}
