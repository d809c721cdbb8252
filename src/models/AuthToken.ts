import { Collection, Db, ObjectId } from 'mongodb';

/**
 * Server-side token record. Only the SHA-256 hash of the bearer string is kept.
 */
export interface IAuthToken {
  _id?: ObjectId;
  tokenHash: string;
  subjectId: string;
  email?: string;
  name?: string;
  role?: string;
  expiresAt: Date;
  createdAt: Date;
}

let authTokensCollection: Collection<IAuthToken>;

export const initializeAuthTokenCollection = async (db: Db) => {
  authTokensCollection = db.collection<IAuthToken>('auth_tokens');

  await Promise.all([
    authTokensCollection.createIndex({ tokenHash: 1 }, { unique: true }),
    // Mongo purges expired records on its own; the verifier still checks expiresAt
    authTokensCollection.createIndex({ expiresAt: 1 }, { expireAfterSeconds: 0 }),
  ]);
};

export const getAuthTokensCollection = (): Collection<IAuthToken> => {
  if (!authTokensCollection) {
    throw new Error('Auth tokens collection not initialized. Call initializeAuthTokenCollection first.');
  }
  return authTokensCollection;
};
