/**
 * Bearer token verification against the JWT trust store
 *
 * A token is accepted only when its signature verifies with the public key of a
 * certificate in the JWT store, and that certificate chains to the root CA store.
 * When no trusted certificate verifies the signature the store is refreshed once
 * and the token is evaluated again.
 */

import type { KeyObject, X509Certificate } from 'crypto';
import * as jose from 'jose';
import { JWT_CACHE_KEY_MINS } from '../constants/defaults.js';
import { sha1Hex, shortSha1Name } from '../crypto/certificates.js';
import { chainsToRoot, isWithinValidity } from '../crypto/chain.js';
import { TokenAuthorizationError } from '../errors/errors.js';
import type { TrustStore } from '../trust/trust-store.js';
import { debugAuth } from '../utils/debug.js';

export const ALLOWED_ALGORITHMS = [
  'RS256',
  'RS384',
  'RS512',
  'PS256',
  'PS384',
  'PS512',
  'ES256',
  'ES384',
] as const;

type AllowedAlgorithm = (typeof ALLOWED_ALGORITHMS)[number];

function isAllowedAlgorithm(alg: unknown): alg is AllowedAlgorithm {
  return ALLOWED_ALGORITHMS.some((a) => a === alg);
}

/** A trusted token signer loaded from the JWT store. */
export interface SignerKey {
  /** Store file stem (short SHA-1), matched against the token's `kid` */
  name: string;
  /** Full SHA-1 hex thumbprint, also accepted as `kid` */
  thumbprint: string;
  certificate: X509Certificate;
  publicKey: KeyObject;
}

/** What a verified token grants, attached to the request as `req.auth`. */
export interface VerifiedToken {
  claims: jose.JWTPayload;
  /** {@link SignerKey.name} of the certificate that verified the signature */
  signer: string;
}

export interface TokenVerifierOptions {
  jwtStore: TrustStore;
  caStore: TrustStore;
  /** Called once per request when the signer is unknown; typically {@link JwtCertRefresher.refresh} */
  refresh?: () => Promise<unknown>;
  /** Minutes the loaded signer keys are reused. Defaults to 60. */
  cacheKeyMins?: number;
  /** Clock, in ms. Tests substitute it. */
  now?: () => number;
}

interface SignerCache {
  expiresAt: number;
  signers: Promise<SignerKey[]>;
}

export class TokenVerifier {
  private cache?: SignerCache;
  private readonly cacheMs: number;
  private readonly now: () => number;

  constructor(private readonly opts: TokenVerifierOptions) {
    this.cacheMs = (opts.cacheKeyMins ?? JWT_CACHE_KEY_MINS) * 60_000;
    this.now = opts.now ?? Date.now;
  }

  /**
   * @throws TokenAuthorizationError when the token is malformed, expired, or not
   * signed by a trusted certificate after one refresh
   */
  async verify(token: string): Promise<VerifiedToken> {
    let header: jose.ProtectedHeaderParameters;
    try {
      header = jose.decodeProtectedHeader(token);
    } catch (err) {
      throw TokenAuthorizationError.invalid(err instanceof Error ? err.message : 'malformed token');
    }
    const alg = header.alg;
    if (!isAllowedAlgorithm(alg)) {
      throw TokenAuthorizationError.invalid(`algorithm ${String(alg)} not allowed`);
    }

    try {
      return await this.verifyWithCurrentSigners(token, alg, header.kid);
    } catch (err) {
      if (!(err instanceof TokenAuthorizationError) || !err.isUnknownSigner || !this.opts.refresh) {
        throw err;
      }
    }

    debugAuth('unknown token signer kid=%s, refreshing JWT certificates', header.kid);
    try {
      await this.opts.refresh();
    } catch (err) {
      debugAuth('JWT certificate refresh failed: %s', err instanceof Error ? err.message : String(err));
      throw TokenAuthorizationError.unknownSigner(header.kid);
    }
    this.invalidate();
    return this.verifyWithCurrentSigners(token, alg, header.kid);
  }

  /** Drop the loaded signer keys; the next verification re-reads the store. */
  invalidate(): void {
    this.cache = undefined;
  }

  /** Signer keys currently trusted, loading the store when the cache has expired. */
  signers(): Promise<SignerKey[]> {
    const now = this.now();
    if (this.cache && this.cache.expiresAt > now) return this.cache.signers;

    const signers = this.loadSigners();
    const entry: SignerCache = { expiresAt: now + this.cacheMs, signers };
    this.cache = entry;
    signers.catch(() => {
      if (this.cache === entry) this.cache = undefined;
    });
    return signers;
  }

  private async verifyWithCurrentSigners(
    token: string,
    alg: AllowedAlgorithm,
    kid: string | undefined,
  ): Promise<VerifiedToken> {
    const signers = await this.signers();
    const candidates = kid ? signers.filter((s) => s.name === kid || s.thumbprint === kid) : signers;

    for (const signer of candidates) {
      try {
        const { payload } = await jose.jwtVerify(token, signer.publicKey, {
          algorithms: [alg],
          currentDate: new Date(this.now()),
        });
        debugAuth('token accepted signer=%s sub=%s', signer.name, payload.sub);
        return { claims: payload, signer: signer.name };
      } catch (err) {
        // The signature verified but the claims did not; another key will not help.
        if (
          err instanceof jose.errors.JWTExpired ||
          err instanceof jose.errors.JWTClaimValidationFailed ||
          err instanceof jose.errors.JWTInvalid
        ) {
          throw TokenAuthorizationError.invalid(err.message);
        }
      }
    }
    if (kid && candidates.length > 0) {
      throw TokenAuthorizationError.invalid(`signature does not verify with signer ${kid}`);
    }
    throw TokenAuthorizationError.unknownSigner(kid);
  }

  private async loadSigners(): Promise<SignerKey[]> {
    const [stored, roots] = await Promise.all([this.opts.jwtStore.list(), this.opts.caStore.list()]);
    const rootCerts = roots.map((r) => r.certificate);
    const storedCerts = stored.map((s) => s.certificate);
    const now = new Date(this.now());

    const signers: SignerKey[] = [];
    for (const { certificate } of stored) {
      if (!isWithinValidity(certificate, now)) {
        debugAuth('skipping signer outside validity subject=%s', certificate.subject);
        continue;
      }
      if (!(await chainsToRoot(certificate, rootCerts, storedCerts))) {
        debugAuth('skipping signer not issued by a trusted root subject=%s', certificate.subject);
        continue;
      }
      signers.push({
        name: shortSha1Name(certificate),
        thumbprint: sha1Hex(certificate),
        certificate,
        publicKey: certificate.publicKey,
      });
    }
    debugAuth('loaded %d trusted signer(s) from %s', signers.length, this.opts.jwtStore.dir);
    return signers;
  }
}
