import { execFile } from 'child_process';
import { chown } from 'fs/promises';
import { promisify } from 'util';
import { SERVICE_USER_NAME } from '../constants/defaults.js';
import { OwnershipError } from '../errors/errors.js';
import { debugSetup } from '../utils/debug.js';
import { chownRecursive } from '../utils/files.js';

const execFileAsync = promisify(execFile);

export interface UserIds {
  uid: number;
  gid: number;
}

export type UserLookup = (user: string) => Promise<UserIds>;
export type ChownFn = (path: string, uid: number, gid: number) => Promise<void>;

/** Parse one `getent passwd` line: `name:x:uid:gid:gecos:home:shell`. */
export function parsePasswdEntry(line: string): UserIds | undefined {
  const [, , uid, gid] = line.trim().split(':');
  if (uid === undefined || gid === undefined) return undefined;
  const ids = { uid: Number(uid), gid: Number(gid) };
  return Number.isInteger(ids.uid) && Number.isInteger(ids.gid) && uid !== '' && gid !== ''
    ? ids
    : undefined;
}

/** Resolve a user through the system user database. */
export const lookupSystemUser: UserLookup = async (user) => {
  let stdout: string;
  try {
    ({ stdout } = await execFileAsync('getent', ['passwd', user]));
  } catch (err) {
    throw OwnershipError.userNotFound(user, err);
  }
  const ids = parsePasswdEntry(stdout.split('\n')[0] ?? '');
  if (!ids) throw OwnershipError.userNotFound(user);
  return ids;
};

export interface OwnershipTransferOptions {
  user?: string;
  lookup?: UserLookup;
  chownTree?: ChownFn;
  chownFile?: ChownFn;
}

/**
 * Hands the files produced by setup to the runtime user.
 */
export class OwnershipTransfer {
  readonly user: string;
  private readonly lookup: UserLookup;
  private readonly chownTree: ChownFn;
  private readonly chownFile: ChownFn;

  constructor(opts: OwnershipTransferOptions = {}) {
    this.user = opts.user ?? SERVICE_USER_NAME;
    this.lookup = opts.lookup ?? lookupSystemUser;
    this.chownTree = opts.chownTree ?? chownRecursive;
    this.chownFile = opts.chownFile ?? chown;
  }

  /**
   * Chown `dir` recursively, then each of `files`.
   *
   * @throws OwnershipError when the user is unknown or a chown fails
   */
  async transfer(dir: string, files: string[] = []): Promise<void> {
    const { uid, gid } = await this.lookup(this.user);
    debugSetup('transferring ownership to %s (%d:%d) dir=%s files=%j', this.user, uid, gid, dir, files);

    try {
      await this.chownTree(dir, uid, gid);
    } catch (err) {
      throw OwnershipError.chownFailed(dir, err);
    }
    for (const file of files) {
      try {
        await this.chownFile(file, uid, gid);
      } catch (err) {
        throw OwnershipError.chownFailed(file, err);
      }
    }
  }
}
