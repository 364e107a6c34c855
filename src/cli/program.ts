import { Command, CommanderError, Option } from 'commander';
import { SERVICE_DISPLAY_NAME } from '../lib/constants/defaults.js';
import { createDefaultTasks } from '../lib/setup/tasks/index.js';
import { SETUP_ALL, SETUP_TASK_NAMES } from '../lib/setup/types.js';
import { getPackageInfo } from '../lib/utils/user-agent.js';
import { handleListCommand } from './commands/list.js';
import { handleRunCommand } from './commands/run.js';
import { handleServiceCommand } from './commands/service.js';
import { handleSetupCommand } from './commands/setup.js';
import { handleTlsCertSha384Command } from './commands/tls-cert-sha384.js';
import { handleUninstallCommand } from './commands/uninstall.js';
import { defaultCliContext, type CliContext } from './utils/context.js';
import { EXIT_FAILURE, handleError } from './utils/errors.js';

export interface CliResult {
  program: Command;
  exitCode: number;
}

/** One `--<flag> <value>` option per distinct setup input, keyed by flag name. */
function setupFlagOptions(): Map<string, Option> {
  const options = new Map<string, Option>();
  for (const task of createDefaultTasks()) {
    for (const input of task.inputs) {
      if (options.has(input.flag)) continue;
      options.set(
        input.flag,
        new Option(`--${input.flag} <value>`, `${input.description} (${input.env})`),
      );
    }
  }
  return options;
}

/** Build a Commander program instance for the qvs CLI. */
export function createCli(ctx: CliContext = defaultCliContext()): { program: Command; exitCode: () => number } {
  const program = new Command();
  let exitCode = 0;

  program
    .name('qvs')
    .description(`${SERVICE_DISPLAY_NAME} - setup, service control and HTTPS server`)
    .version(getPackageInfo().version, '-v, --version');

  // In test mode override default exit (help, errors) to throw instead of process.exit
  if (ctx.env.QVS_CLI_TEST) {
    program.exitOverride();
  }

  // Runs a command body, mapping its outcome to the process exit code
  const action =
    <A extends unknown[]>(body: (...args: A) => Promise<number | void>) =>
    async (...args: A) => {
      try {
        exitCode = (await body(...args)) ?? 0;
      } catch (e) {
        exitCode = handleError(e);
      }
    };

  const flagOptions = setupFlagOptions();
  const setup = program
    .command('setup')
    .description(`Run a setup task: ${[...SETUP_TASK_NAMES, SETUP_ALL].join(', ')}`)
    .argument('[task]', 'setup task, or "all" for download_ca_cert, download_cert and server')
    .option('--force', 'run the task even when its result already exists');
  for (const option of flagOptions.values()) setup.addOption(option);
  setup.action(
    action(async (task: string | undefined, _opts: unknown, cmd: Command) => {
      const flags: Record<string, string | undefined> = {};
      for (const [flag, option] of flagOptions) {
        const value: unknown = cmd.getOptionValue(option.attributeName());
        if (typeof value === 'string') flags[flag] = value;
      }
      await handleSetupCommand({ task, flags, force: cmd.getOptionValue('force') === true }, ctx);
    }),
  );

  for (const name of ['start', 'stop', 'status'] as const) {
    program
      .command(name)
      .description(`${name} the systemd service`)
      .action(action(() => handleServiceCommand(name, ctx)));
  }

  program
    .command('run')
    .description('Run the HTTPS server in the foreground')
    .action(
      action(async () => {
        const report = await handleRunCommand(ctx);
        return report.reason === 'listener-error' ? EXIT_FAILURE : 0;
      }),
    );

  program
    .command('tlscertsha384')
    .description('Print the SHA-384 digest of the TLS certificate')
    .action(
      action(async () => {
        await handleTlsCertSha384Command(ctx);
      }),
    );

  program
    .command('uninstall')
    .description('Uninstall the service')
    .option('--purge', 'also remove the configuration, trust stores and TLS identity')
    .action(
      action(async (opts: { purge?: boolean }) => {
        await handleUninstallCommand(opts, ctx);
      }),
    );

  program
    .command('list')
    .description('Print the contents of every file in a directory')
    .argument('<dir>', 'directory to list')
    .action(action((dir: string) => handleListCommand(dir)));

  return { program, exitCode: () => exitCode };
}

/** Parse arguments and report the exit code (no automatic exit). */
export async function runCli(argv: string[], ctx?: CliContext): Promise<CliResult> {
  const { program, exitCode } = createCli(ctx);
  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (err: unknown) {
    if (!(err instanceof CommanderError)) throw err;
    // help and version are reported as errors under exitOverride
    return { program, exitCode: err.exitCode };
  }
  return { program, exitCode: exitCode() };
}
