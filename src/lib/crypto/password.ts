import { compare, hash } from 'bcryptjs';
import { ADMIN_PASSWORD_BCRYPT_COST } from '../constants/defaults.js';

/** Salted bcrypt hash of `password`. */
export function hashPassword(password: string, cost = ADMIN_PASSWORD_BCRYPT_COST): Promise<string> {
  return hash(password, cost);
}

/** False for a wrong password and for a value that is not a bcrypt hash. */
export function verifyPassword(password: string, encoded: string): Promise<boolean> {
  return compare(password, encoded);
}
