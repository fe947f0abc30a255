/**
 * Access-token verification.
 *
 * Tokens are issued by the separate login service as HMAC-signed JWTs; this
 * service only verifies them. The `sub` claim is the trusted user id that
 * scopes every storage key and registry lookup.
 */

import { createHmac, timingSafeEqual } from 'crypto';
import { z } from 'zod';
import { AuthConfig, JwtAlgorithm } from '../config';

const HMAC_DIGEST: Record<JwtAlgorithm, string> = {
  HS256: 'sha256',
  HS384: 'sha384',
  HS512: 'sha512',
};

const tokenHeader = z.object({
  alg: z.string(),
  typ: z.string().optional(),
});

const tokenClaims = z
  .object({
    sub: z.union([z.string(), z.number()]).transform(String),
    exp: z.number().optional(),
    nbf: z.number().optional(),
    iss: z.string().optional(),
    aud: z.union([z.string(), z.array(z.string())]).optional(),
  })
  .passthrough();

export type AccessTokenClaims = z.infer<typeof tokenClaims>;

export type TokenVerification =
  | { ok: true; userId: string; claims: AccessTokenClaims }
  | { ok: false; reason: string };

function decodeSegment(segment: string): unknown {
  try {
    return JSON.parse(Buffer.from(segment, 'base64url').toString('utf8'));
  } catch {
    return undefined;
  }
}

export function verifyAccessToken(
  token: string,
  config: AuthConfig,
  nowSeconds: number = Math.floor(Date.now() / 1000),
): TokenVerification {
  const parts = token.split('.');
  if (parts.length !== 3) {
    return { ok: false, reason: 'Malformed token' };
  }
  const [encodedHeader, encodedClaims, encodedSignature] = parts;

  const header = tokenHeader.safeParse(decodeSegment(encodedHeader));
  if (!header.success) {
    return { ok: false, reason: 'Malformed token header' };
  }
  if (header.data.alg !== config.algorithm) {
    return { ok: false, reason: `Unexpected signing algorithm: ${header.data.alg}` };
  }

  const expected = createHmac(HMAC_DIGEST[config.algorithm], config.secret)
    .update(`${encodedHeader}.${encodedClaims}`)
    .digest();
  const actual = Buffer.from(encodedSignature, 'base64url');
  if (actual.length !== expected.length || !timingSafeEqual(actual, expected)) {
    return { ok: false, reason: 'Invalid token signature' };
  }

  const claims = tokenClaims.safeParse(decodeSegment(encodedClaims));
  if (!claims.success) {
    return { ok: false, reason: 'Malformed token claims' };
  }
  const { sub, exp, nbf, iss, aud } = claims.data;

  if (exp !== undefined && nowSeconds >= exp) {
    return { ok: false, reason: 'Token expired' };
  }
  if (nbf !== undefined && nowSeconds < nbf) {
    return { ok: false, reason: 'Token not yet valid' };
  }
  if (config.issuer && iss !== config.issuer) {
    return { ok: false, reason: 'Token issuer mismatch' };
  }
  if (config.audience) {
    const audiences = aud === undefined ? [] : Array.isArray(aud) ? aud : [aud];
    if (!audiences.includes(config.audience)) {
      return { ok: false, reason: 'Token audience mismatch' };
    }
  }
  if (!sub) {
    return { ok: false, reason: 'Token has no subject' };
  }

  return { ok: true, userId: sub, claims: claims.data };
}
