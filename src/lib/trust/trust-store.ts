/**
 * Trusted certificate set stored as a directory of PEM files
 *
 * Each certificate lives in its own file named after a short SHA-1 digest of its DER
 * encoding (`<digest>.pem`), so storing the same certificate twice is a no-op. Files
 * are only ever added: they are created complete through a temporary file and a
 * hard link, so concurrent readers never see a partially written certificate and two
 * writers of the same certificate cannot both create it.
 *
 * Used for the root CA store (`certs/trustedca`) and the JWT signer store
 * (`certs/trustedjwt`).
 */

import type { X509Certificate } from 'crypto';
import { mkdir, readdir, readFile } from 'fs/promises';
import { join } from 'path';
import { parsePemCertificates, shortSha1Name } from '../crypto/certificates.js';
import { TrustStoreError } from '../errors/errors.js';
import { debugTrust } from '../utils/debug.js';
import { createFileExclusive, isNotFound } from '../utils/files.js';

export const TRUST_STORE_EXTENSION = '.pem';

/** One stored certificate. */
export interface TrustedCertificate {
  /** File name inside the store directory */
  fileName: string;
  /** Normalized PEM of the single certificate in the file */
  pem: string;
  certificate: X509Certificate;
}

/** Outcome of {@link TrustStore.addPemBundle}. */
export interface AddCertificatesResult {
  /** File names created by this call */
  added: string[];
  /** File names that already held the certificate */
  existing: string[];
}

export class TrustStore {
  /** Serializes writers of this instance; readers never wait on it. */
  private writeQueue: Promise<unknown> = Promise.resolve();

  constructor(public readonly dir: string) {}

  /**
   * Load every `*.pem` file of the store. A file may hold several certificates
   * (stores populated by other tools); each one is returned. A missing directory
   * is an empty store.
   */
  async list(): Promise<TrustedCertificate[]> {
    let names: string[];
    try {
      names = await readdir(this.dir);
    } catch (err) {
      if (isNotFound(err)) return [];
      throw TrustStoreError.io(this.dir, err);
    }

    const result: TrustedCertificate[] = [];
    for (const fileName of names.filter((n) => n.endsWith(TRUST_STORE_EXTENSION)).sort()) {
      const path = join(this.dir, fileName);
      let text: string;
      try {
        text = await readFile(path, 'utf-8');
      } catch (err) {
        if (isNotFound(err)) continue;
        throw TrustStoreError.io(this.dir, err);
      }
      for (const certificate of parsePemCertificates(text, path)) {
        result.push({ fileName, pem: certificate.toString(), certificate });
      }
    }
    return result;
  }

  /** PEM strings of all stored certificates. */
  async pems(): Promise<string[]> {
    return (await this.list()).map((c) => c.pem);
  }

  async isEmpty(): Promise<boolean> {
    return (await this.list()).length === 0;
  }

  /**
   * Store every certificate of a PEM bundle, one file per certificate.
   *
   * @throws TrustStoreError when the bundle holds no certificate, or when a file with
   * the digest name exists but holds a different certificate
   */
  async addPemBundle(bundle: string, source = 'PEM bundle'): Promise<AddCertificatesResult> {
    const certificates = parsePemCertificates(bundle, source);
    if (certificates.length === 0) throw TrustStoreError.noCertificates(source);

    const run = this.writeQueue.then(() => this.writeAll(certificates));
    this.writeQueue = run.catch(() => undefined);
    return run;
  }

  private async writeAll(certificates: X509Certificate[]): Promise<AddCertificatesResult> {
    try {
      await mkdir(this.dir, { recursive: true, mode: 0o755 });
    } catch (err) {
      throw TrustStoreError.io(this.dir, err);
    }

    const result: AddCertificatesResult = { added: [], existing: [] };
    for (const certificate of certificates) {
      const fileName = shortSha1Name(certificate) + TRUST_STORE_EXTENSION;
      const path = join(this.dir, fileName);
      const pem = certificate.toString();

      let created: boolean;
      try {
        created = await createFileExclusive(path, pem, 0o644);
      } catch (err) {
        throw TrustStoreError.io(this.dir, err);
      }

      if (created) {
        debugTrust('stored certificate %s subject=%s', path, certificate.subject);
        result.added.push(fileName);
        continue;
      }

      const onDisk = parsePemCertificates(await readFile(path, 'utf-8'), path);
      if (!onDisk.some((c) => c.raw.equals(certificate.raw))) {
        throw TrustStoreError.conflictingFile(path);
      }
      debugTrust('certificate already trusted %s', path);
      result.existing.push(fileName);
    }
    return result;
  }
}
