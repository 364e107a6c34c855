import { randomBytes } from 'crypto';
import {
  BasicConstraintsExtension,
  ExtendedKeyUsage,
  ExtendedKeyUsageExtension,
  KeyUsageFlags,
  KeyUsagesExtension,
  SubjectAlternativeNameExtension,
  X509CertificateGenerator,
} from '@peculiar/x509';
import { SELF_SIGNED_VALIDITY_DAYS } from '../constants/defaults.js';
import {
  exportPrivateKeyPem,
  generateTlsKeyPair,
  signingAlgorithmFor,
  toGeneralNames,
  type TlsKeyAlgorithm,
} from './csr.js';

export interface SelfSignedIdentity {
  keyPem: string;
  certPem: string;
}

const SELF_SIGNED_ALGORITHM: TlsKeyAlgorithm = { kind: 'ec', namedCurve: 'P-384', hash: 'SHA-384' };

/**
 * Self-signed server certificate for `hostNames`, used when no CMS-issued
 * certificate is wanted (the `tls` setup task). CN is the first host name.
 */
export async function createSelfSignedIdentity(
  hostNames: string[],
  validityDays = SELF_SIGNED_VALIDITY_DAYS,
  algo: TlsKeyAlgorithm = SELF_SIGNED_ALGORITHM,
): Promise<SelfSignedIdentity> {
  const [commonName] = hostNames;
  if (!commonName) throw new Error('At least one host name is required');

  const keys = await generateTlsKeyPair(algo);
  const notBefore = new Date();
  const notAfter = new Date(notBefore.getTime() + validityDays * 86_400_000);

  const cert = await X509CertificateGenerator.createSelfSigned({
    serialNumber: randomBytes(16).toString('hex').replace(/^[89a-f]/, '1'),
    name: `CN=${commonName}`,
    notBefore,
    notAfter,
    keys,
    signingAlgorithm: signingAlgorithmFor(algo),
    extensions: [
      new BasicConstraintsExtension(false, undefined, true),
      new KeyUsagesExtension(KeyUsageFlags.digitalSignature | KeyUsageFlags.keyEncipherment, true),
      new ExtendedKeyUsageExtension([ExtendedKeyUsage.serverAuth]),
      new SubjectAlternativeNameExtension(toGeneralNames(hostNames)),
    ],
  });

  return { keyPem: await exportPrivateKeyPem(keys.privateKey), certPem: cert.toString('pem') + '\n' };
}
