import { Db, Collection, ObjectId } from 'mongodb';
import { ChatRole } from '../types';

export interface IUser {
  _id?: ObjectId;
  id: string;
  subjectId: string;
  email: string;
  name: string;
  role: ChatRole;
  createdAt: Date;
  updatedAt?: Date;
}

// This will be initialized when the database connection is established
let usersCollection: Collection<IUser>;

export const initializeUserCollection = async (db: Db) => {
  usersCollection = db.collection<IUser>('users');

  // One local record per credential subject; provisioning relies on this to stay race-safe
  try {
    await usersCollection.createIndex(
      { subjectId: 1 },
      { unique: true, name: 'subject_id_unique' }
    );
    console.log("✅ User collection initialized with unique subject index");
  } catch (error) {
    console.warn("⚠️  Warning: Could not create unique subject index:", error);
  }

  try {
    await usersCollection.createIndex({ id: 1 }, { unique: true });
  } catch (error) {
    console.warn("⚠️  Warning: Could not create id index:", error);
  }
};

export const getUsersCollection = (): Collection<IUser> => {
  if (!usersCollection) {
    throw new Error('Users collection not initialized. Call initializeUserCollection first.');
  }
  return usersCollection;
};
