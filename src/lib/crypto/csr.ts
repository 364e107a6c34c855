/**
 * TLS identity key and CSR generation
 *
 * Certificate Signing Request (PKCS#10) generation for the CMS `download_cert` flow.
 * Features:
 * - RSA 2048/3072/4096 and ECDSA P-256/P-384 keys
 * - Subject Alternative Names, IP addresses as IP SANs
 * - WebCrypto API based (Node's global implementation)
 */

import { isIP } from 'net';
import {
  cryptoProvider,
  PemConverter,
  Pkcs10CertificateRequestGenerator,
  SubjectAlternativeNameExtension,
  type JsonGeneralName,
} from '@peculiar/x509';

const provider: Crypto = globalThis.crypto;

// Bind WebCrypto provider for @peculiar/x509
cryptoProvider.set(provider);

/**
 * ECDSA key configuration
 */
export type EcKeyAlgorithm = {
  kind: 'ec';
  namedCurve: 'P-256' | 'P-384';
  hash: 'SHA-256' | 'SHA-384';
};

/**
 * RSA key configuration (RSASSA-PKCS1-v1_5)
 */
export type RsaKeyAlgorithm = {
  kind: 'rsa';
  /** 3072 is what CMS issues TLS certificates for by default */
  modulusLength: 2048 | 3072 | 4096;
  hash: 'SHA-256' | 'SHA-384';
};

export type TlsKeyAlgorithm = EcKeyAlgorithm | RsaKeyAlgorithm;

export interface CreateCsrResult {
  /** PEM-encoded CSR, as posted to CMS */
  pem: string;
  /** The key pair used; the private key matches the certificate CMS returns */
  keys: CryptoKeyPair;
}

export function signingAlgorithmFor(algo: TlsKeyAlgorithm): RsaHashedImportParams | EcdsaParams {
  return algo.kind === 'ec'
    ? { name: 'ECDSA', hash: algo.hash }
    : { name: 'RSASSA-PKCS1-v1_5', hash: algo.hash };
}

export async function generateTlsKeyPair(algo: TlsKeyAlgorithm): Promise<CryptoKeyPair> {
  if (algo.kind === 'ec') {
    return provider.subtle.generateKey({ name: 'ECDSA', namedCurve: algo.namedCurve }, true, [
      'sign',
      'verify',
    ]);
  }

  return provider.subtle.generateKey(
    {
      name: 'RSASSA-PKCS1-v1_5',
      modulusLength: algo.modulusLength,
      publicExponent: new Uint8Array([0x01, 0x00, 0x01]),
      hash: algo.hash,
    },
    true,
    ['sign', 'verify'],
  );
}

/** Split a comma separated SAN list, dropping blanks. */
export function parseSanList(value: string): string[] {
  return value
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

/** Map host names and IP addresses to SAN general names. */
export function toGeneralNames(names: string[]): JsonGeneralName[] {
  return names.map(
    (value): JsonGeneralName => (isIP(value) ? { type: 'ip', value } : { type: 'dns', value }),
  );
}

/**
 * Creates a CSR with CN = `commonName` and SAN = all provided names.
 */
export async function createTlsCsr(
  names: string[],
  commonName: string,
  algo: TlsKeyAlgorithm,
  keys?: CryptoKeyPair,
): Promise<CreateCsrResult> {
  if (!names.length) {
    throw new Error('SAN list must contain at least one host name');
  }

  const keyPair = keys ?? (await generateTlsKeyPair(algo));

  const csr = await Pkcs10CertificateRequestGenerator.create({
    name: `CN=${commonName}`,
    keys: keyPair,
    signingAlgorithm: signingAlgorithmFor(algo),
    extensions: [new SubjectAlternativeNameExtension(toGeneralNames(names))],
  });

  return { pem: csr.toString('pem'), keys: keyPair };
}

/** PKCS#8 PEM of an extractable private key. */
export async function exportPrivateKeyPem(key: CryptoKey): Promise<string> {
  const der = await provider.subtle.exportKey('pkcs8', key);
  return `${PemConverter.encode(der, 'PRIVATE KEY')}\n`;
}
