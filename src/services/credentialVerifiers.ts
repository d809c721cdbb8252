import admin, { isFirebaseConfigured } from '../firebaseAdmin';
import { getAuthTokensCollection } from '../models/AuthToken';
import { CredentialClaims } from '../types';
import { hashToken } from '../utils/tokenUtils';
import { verifyAccessToken } from '../utils/jwtUtils';

export interface CredentialVerifier {
  readonly name: string;
  /** Resolves with the credential's claims, rejects when it cannot vouch for it. */
  verify(token: string): Promise<CredentialClaims>;
}

export type VerificationResult =
  | { status: 'verified'; verifier: string; claims: CredentialClaims }
  | { status: 'failed'; reasons: string[] };

const describeFailure = (error: unknown) => (error instanceof Error ? error.message : String(error));

const stringClaim = (value: unknown): string | undefined =>
  typeof value === 'string' && value.length > 0 ? value : undefined;

/**
 * Tries each verifier in order. The first one that accepts the token wins;
 * the failure reasons are only reported when every verifier rejected it.
 */
export const verifyWithChain = async (
  verifiers: readonly CredentialVerifier[],
  token: string
): Promise<VerificationResult> => {
  const reasons: string[] = [];

  for (const verifier of verifiers) {
    try {
      const claims = await verifier.verify(token);
      return { status: 'verified', verifier: verifier.name, claims };
    } catch (error) {
      reasons.push(`${verifier.name}: ${describeFailure(error)}`);
    }
  }

  if (verifiers.length === 0) {
    reasons.push('No credential verifiers configured');
  }
  return { status: 'failed', reasons };
};

export const firebaseVerifier: CredentialVerifier = {
  name: 'firebase',
  async verify(token) {
    if (!isFirebaseConfigured()) {
      throw new Error('Firebase Admin is not configured');
    }
    const decoded = await admin.auth().verifyIdToken(token);
    return {
      subjectId: decoded.uid,
      email: stringClaim(decoded.email),
      name: stringClaim(decoded.name),
      role: stringClaim(decoded.role),
    };
  },
};

export const accessTokenVerifier: CredentialVerifier = {
  name: 'access-token',
  async verify(token) {
    return verifyAccessToken(token);
  },
};

export const storedTokenVerifier: CredentialVerifier = {
  name: 'stored-token',
  async verify(token) {
    const record = await getAuthTokensCollection().findOne({ tokenHash: hashToken(token) });
    if (!record) {
      throw new Error('Token not found');
    }
    if (record.expiresAt.getTime() <= Date.now()) {
      throw new Error('Token expired');
    }
    return {
      subjectId: record.subjectId,
      email: record.email,
      name: record.name,
      role: record.role,
    };
  },
};

/** Signed tokens first, then the server-side token records. */
export const defaultVerifiers: readonly CredentialVerifier[] = [
  firebaseVerifier,
  accessTokenVerifier,
  storedTokenVerifier,
];
