import crypto from 'crypto';

/**
 * Hashes a token using SHA-256.
 * We store the hash in the DB, not the raw token.
 */
export function hashToken(token: string): string {
  return crypto
    .createHash('sha256')
    .update(token)
    .digest('hex');
}

/**
 * Pulls the bearer string out of an Authorization header value.
 * Returns null when the header is missing or not a Bearer credential.
 */
export function extractBearerToken(header: string | undefined): string | null {
  if (!header || !header.startsWith('Bearer ')) return null;
  const token = header.slice('Bearer '.length).trim();
  return token.length > 0 ? token : null;
}
