export { SetupRunner, type SetupRunnerOptions, type SetupRunOptions } from './runner.js';
export { TaskInputs } from './inputs.js';
export {
  lookupSystemUser,
  OwnershipTransfer,
  parsePasswdEntry,
  type ChownFn,
  type OwnershipTransferOptions,
  type UserIds,
  type UserLookup,
} from './ownership.js';
export * from './tasks/index.js';
export * from './types.js';
