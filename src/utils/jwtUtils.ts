import jwt, { Secret } from 'jsonwebtoken';
import crypto from 'crypto';
import dotenv from 'dotenv';
import { CredentialClaims } from '../types';

// The secret is read at import time, before the entry point's own dotenv call
dotenv.config();

const getRequiredJwtSecret = (): Secret => {
  const configured = process.env.JWT_SECRET;
  if (configured && configured.trim().length > 0) {
    return configured;
  }

  const isProduction = process.env.NODE_ENV === 'production';
  if (isProduction) {
    throw new Error('JWT_SECRET is required in production');
  }

  const ephemeral = crypto.randomBytes(32).toString('hex');
  console.warn('[jwtUtils] JWT_SECRET is not set. Using an ephemeral runtime secret for development only.');
  return ephemeral;
};

const JWT_SECRET: Secret = getRequiredJwtSecret();

const optionalString = (value: unknown): string | undefined =>
  typeof value === 'string' && value.length > 0 ? value : undefined;

/**
 * Verifies an HS256 access token signed with the shared `JWT_SECRET` by the
 * service that issued it.
 * Throws when the signature, expiry or token type is wrong.
 */
export const verifyAccessToken = (token: string): CredentialClaims => {
  const decoded = jwt.verify(token, JWT_SECRET, { algorithms: ['HS256'] });
  if (typeof decoded === 'string') {
    throw new Error('Unexpected token payload');
  }
  if (decoded.type !== 'access') {
    throw new Error('Not an access token');
  }
  if (!decoded.sub) {
    throw new Error('Token has no subject');
  }

  return {
    subjectId: decoded.sub,
    email: optionalString(decoded.email),
    name: optionalString(decoded.name),
    role: optionalString(decoded.role),
  };
};
