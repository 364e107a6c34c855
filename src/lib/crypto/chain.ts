import type { X509Certificate as NodeX509Certificate } from 'crypto';
import { X509Certificate, X509ChainBuilder } from '@peculiar/x509';

/**
 * True when `leaf` chains, signature by signature, up to one of `roots`.
 * `intermediates` may be used as links of the chain but never terminate it.
 */
export async function chainsToRoot(
  leaf: NodeX509Certificate,
  roots: NodeX509Certificate[],
  intermediates: NodeX509Certificate[] = [],
): Promise<boolean> {
  if (roots.length === 0) return false;
  if (roots.some((root) => root.raw.equals(leaf.raw))) return true;

  const builder = new X509ChainBuilder({
    certificates: [...intermediates, ...roots].map((c) => new X509Certificate(c.raw)),
  });
  const chain = await builder.build(new X509Certificate(leaf.raw), globalThis.crypto);
  const top = chain[chain.length - 1];
  if (!top || chain.length < 2) return false;

  const topDer = Buffer.from(top.rawData);
  return roots.some((root) => root.raw.equals(topDer));
}

/** True when `now` falls inside the validity period of `cert`. */
export function isWithinValidity(cert: NodeX509Certificate, now = new Date()): boolean {
  return new Date(cert.validFrom) <= now && now <= new Date(cert.validTo);
}
