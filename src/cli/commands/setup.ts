import chalk from 'chalk';
import { UsageError } from '../../lib/errors/errors.js';
import { SetupRunner } from '../../lib/setup/runner.js';
import type { SetupFlags, SetupReport } from '../../lib/setup/types.js';
import { createSpinner, render } from '../logger.js';
import type { CliContext } from '../utils/context.js';

export interface SetupCommandOptions {
  task?: string;
  flags: SetupFlags;
  force?: boolean;
}

/** Run a setup task (or `all`) with spinner output per task. */
export async function handleSetupCommand(
  options: SetupCommandOptions,
  ctx: CliContext,
): Promise<SetupReport> {
  if (!options.task) throw UsageError.missingArgument('task');
  const spinner = createSpinner();

  const runner = new SetupRunner({
    paths: ctx.paths,
    env: ctx.env,
    ...ctx.setup,
    onTaskStart: (task) => spinner.start(`${task.name}: ${task.description}`),
    onTaskEnd: (result) => {
      if (result.status === 'skipped') spinner.info(`${result.task}: already done, skipped`);
      else spinner.succeed(`${result.task}: completed`);
    },
  });

  let report: SetupReport;
  try {
    report = await runner.run(options.task.toLowerCase(), {
      flags: options.flags,
      force: options.force ?? false,
    });
  } catch (err) {
    spinner.fail();
    throw err;
  }

  if (report.ownershipTransferred) {
    render.line(chalk.gray(`Ownership of ${ctx.paths.configDir} transferred to the service user`));
  }
  render.success('Setup finished');
  return report;
}
