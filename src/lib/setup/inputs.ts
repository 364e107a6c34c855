import { InsufficientArgumentsError } from '../errors/errors.js';
import type { SetupFlags, SetupTaskName, TaskInputSpec } from './types.js';

/**
 * Input values of one task, keyed by environment variable name. A flag takes
 * precedence over the environment; empty values count as absent.
 */
export class TaskInputs {
  private constructor(
    readonly task: SetupTaskName,
    private readonly specs: readonly TaskInputSpec[],
    private readonly values: ReadonlyMap<string, string>,
  ) {}

  /**
   * @throws InsufficientArgumentsError for the first required input given neither
   * as environment variable nor as flag
   */
  static resolve(
    task: SetupTaskName,
    specs: readonly TaskInputSpec[],
    flags: SetupFlags,
    env: NodeJS.ProcessEnv,
  ): TaskInputs {
    const values = new Map<string, string>();
    for (const spec of specs) {
      const value = nonEmpty(flags[spec.flag]) ?? nonEmpty(env[spec.env]);
      if (value !== undefined) {
        values.set(spec.env, value);
      } else if (spec.required) {
        throw InsufficientArgumentsError.missing(task, spec.env, spec.flag);
      }
    }
    return new TaskInputs(task, specs, values);
  }

  get(env: string): string | undefined {
    return this.values.get(env);
  }

  require(env: string): string {
    const value = this.values.get(env);
    if (value === undefined) {
      const flag = this.specs.find((s) => s.env === env)?.flag ?? env.toLowerCase();
      throw InsufficientArgumentsError.missing(this.task, env, flag);
    }
    return value;
  }
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}
