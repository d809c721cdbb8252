import { v4 as uuidv4 } from 'uuid';
import { getUsersCollection, IUser } from '../models/User';
import { ChatRole, ChatUser, CredentialClaims } from '../types';
import { ChatError, isDuplicateKeyError } from '../utils/chatErrors';
import { CredentialVerifier, defaultVerifiers, verifyWithChain } from './credentialVerifiers';

export type IdentityResolver = (credential: string) => Promise<ChatUser>;

export const UNKNOWN_EMAIL = 'unknown@example.com';
export const ANONYMOUS_NAME = 'Anonymous User';

export const normalizeRole = (claim: string | undefined): ChatRole => (claim === 'admin' ? 'admin' : 'user');

// "jane.doe@example.com" -> "Jane.Doe"
export const displayNameFromEmail = (email: string): string => {
  const localPart = email.split('@')[0] || email;
  return localPart.replace(/[A-Za-z]+/g, word => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());
};

const toChatUser = (user: IUser): ChatUser => ({
  id: user.id,
  subjectId: user.subjectId,
  email: user.email,
  name: user.name,
  role: user.role,
  createdAt: user.createdAt,
});

/** The credential is authoritative: a stored role that disagrees with it is overwritten. */
const reconcileRole = async (user: IUser, claimedRole: ChatRole): Promise<ChatUser> => {
  if (user.role === claimedRole) {
    return toChatUser(user);
  }

  await getUsersCollection().updateOne(
    { id: user.id },
    { $set: { role: claimedRole, updatedAt: new Date() } }
  );
  console.log(`🔁 Role for user ${user.id} synced from credential: ${user.role} -> ${claimedRole}`);
  return toChatUser({ ...user, role: claimedRole });
};

const provisionUser = async (claims: CredentialClaims, role: ChatRole): Promise<ChatUser> => {
  const users = getUsersCollection();
  const email = claims.email || UNKNOWN_EMAIL;
  const name = claims.name || (claims.email ? displayNameFromEmail(claims.email) : ANONYMOUS_NAME);

  const user: IUser = {
    id: uuidv4(),
    subjectId: claims.subjectId,
    email,
    name,
    role,
    createdAt: new Date(),
  };

  try {
    await users.insertOne(user);
    console.log(`👤 Provisioned user ${user.id} for subject ${claims.subjectId}`);
    return toChatUser(user);
  } catch (error) {
    // Another request provisioned the same subject first
    if (!isDuplicateKeyError(error)) throw error;
    const winner = await users.findOne({ subjectId: claims.subjectId });
    if (!winner) throw error;
    return reconcileRole(winner, role);
  }
};

export const syncUserFromClaims = async (claims: CredentialClaims): Promise<ChatUser> => {
  const claimedRole = normalizeRole(claims.role);
  const existing = await getUsersCollection().findOne({ subjectId: claims.subjectId });

  if (!existing) {
    return provisionUser(claims, claimedRole);
  }
  return reconcileRole(existing, claimedRole);
};

export const createIdentityResolver = (
  verifiers: readonly CredentialVerifier[] = defaultVerifiers
): IdentityResolver => async (credential: string) => {
  const result = await verifyWithChain(verifiers, credential);

  if (result.status === 'failed') {
    console.warn(`⚠️ Credential rejected by every verifier: ${result.reasons.join('; ')}`);
    throw new ChatError('unauthenticated', 'Invalid authentication credentials');
  }

  return syncUserFromClaims(result.claims);
};
