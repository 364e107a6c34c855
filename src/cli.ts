#!/usr/bin/env node

/**
 * CLI entrypoint. Substantive logic resides in the command modules under ./cli.
 */
import { runCli } from './cli/program.js';
import { EXIT_FAILURE, handleError } from './cli/utils/errors.js';

process.on('unhandledRejection', (err) => {
  process.exit(handleError(err));
});
process.on('uncaughtException', (err) => {
  process.exit(handleError(err));
});

runCli(process.argv.slice(2))
  .then(({ exitCode }) => {
    process.exitCode = exitCode;
  })
  .catch((err: unknown) => {
    handleError(err);
    process.exitCode = EXIT_FAILURE;
  });
