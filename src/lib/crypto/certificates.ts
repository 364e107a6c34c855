/**
 * X.509 certificate helpers shared by the trust stores, the CMS client and the
 * HTTPS gateway.
 */

import { createHash, createPrivateKey, createPublicKey, X509Certificate } from 'crypto';
import { readFile } from 'fs/promises';
import { ServiceIdentityError, TrustStoreError } from '../errors/errors.js';

const PEM_CERTIFICATE = /-----BEGIN CERTIFICATE-----[\s\S]+?-----END CERTIFICATE-----/g;

/** Length of the hex prefix of the SHA-1 digest used as trust store file name. */
export const SHORT_NAME_LENGTH = 16;

/**
 * Parse every `CERTIFICATE` PEM block of `text`.
 *
 * @param source - used in the error raised when a block is not a valid certificate
 */
export function parsePemCertificates(text: string, source = 'PEM input'): X509Certificate[] {
  const blocks = text.match(PEM_CERTIFICATE) ?? [];
  return blocks.map((block) => {
    try {
      return new X509Certificate(block);
    } catch (err) {
      throw new TrustStoreError(`Malformed certificate in ${source}`, { source }, { cause: err });
    }
  });
}

/** Normalized PEM blocks of every certificate in `text`. */
export function splitPemCertificates(text: string): string[] {
  return parsePemCertificates(text).map((cert) => cert.toString());
}

export function sha384Hex(der: Uint8Array): string {
  return createHash('sha384').update(der).digest('hex');
}

/** Content-derived file stem of a certificate: hex SHA-1 of its DER, shortened. */
export function shortSha1Name(cert: X509Certificate): string {
  return createHash('sha1').update(cert.raw).digest('hex').slice(0, SHORT_NAME_LENGTH);
}

export function sha1Hex(cert: X509Certificate): string {
  return createHash('sha1').update(cert.raw).digest('hex');
}

/** Lowercase hex SHA-384 of the first certificate in a PEM file. */
export async function certificateFileSha384(certFile: string): Promise<string> {
  const [first] = parsePemCertificates(await readFile(certFile, 'utf-8'), certFile);
  if (!first) throw TrustStoreError.noCertificates(certFile);
  return sha384Hex(first.raw);
}

/** True when the private key in `keyPem` belongs to the public key of `cert`. */
export function keyMatchesCertificate(keyPem: string, cert: X509Certificate): boolean {
  const fromKey = createPublicKey(createPrivateKey(keyPem)).export({ type: 'spki', format: 'der' });
  const fromCert = cert.publicKey.export({ type: 'spki', format: 'der' });
  return fromKey.equals(fromCert);
}

export interface ServiceIdentity {
  keyPem: string;
  certPem: string;
  certificate: X509Certificate;
}

/**
 * Read and check the TLS key/certificate pair: both readable, the certificate
 * parseable, and the key matching the leaf certificate.
 */
export async function loadServiceIdentity(keyFile: string, certFile: string): Promise<ServiceIdentity> {
  const read = async (path: string) => {
    try {
      return await readFile(path, 'utf-8');
    } catch (err) {
      throw ServiceIdentityError.unreadable(path, err);
    }
  };
  const keyPem = await read(keyFile);
  const certPem = await read(certFile);

  let leaf: X509Certificate | undefined;
  try {
    [leaf] = parsePemCertificates(certPem, certFile);
  } catch (err) {
    throw ServiceIdentityError.unreadable(certFile, err);
  }
  if (!leaf) throw ServiceIdentityError.unreadable(certFile, TrustStoreError.noCertificates(certFile));

  let matches: boolean;
  try {
    matches = keyMatchesCertificate(keyPem, leaf);
  } catch (err) {
    throw ServiceIdentityError.unreadable(keyFile, err);
  }
  if (!matches) throw ServiceIdentityError.mismatch(keyFile, certFile);

  return { keyPem, certPem, certificate: leaf };
}
