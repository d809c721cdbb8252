import { MongoClient, Db, MongoClientOptions } from "mongodb";
import dotenv from "dotenv";
import { initializeUserCollection } from "./models/User";
import { initializeChatThreadCollection } from "./models/ChatThread";
import { initializeChatFileCollection } from "./models/ChatFile";
import { initializeAuthTokenCollection } from "./models/AuthToken";

dotenv.config();

const mongoUri = process.env.MONGO_URI || "mongodb://localhost:27017/tailoring";
const dbName = process.env.MONGO_DB_NAME || "tailoring";

const MAX_CONNECT_ATTEMPTS = 5;
const RECONNECT_INTERVAL_MS = 30000;

const isAtlasUri = (uri: string) => uri.includes('mongodb+srv') || uri.includes('mongodb.net');

const connectionOptions: MongoClientOptions = {
  maxPoolSize: 10,
  minPoolSize: 2,
  serverSelectionTimeoutMS: 10000,
  connectTimeoutMS: 10000,
  socketTimeoutMS: 45000,
  retryWrites: true,
  retryReads: true,
  ...(isAtlasUri(mongoUri) ? { tls: true } : {}),
};

const client = new MongoClient(mongoUri, connectionOptions);

let chatDb: Db | null = null;
let connected = false;
let reconnectTimer: NodeJS.Timeout | null = null;
let listenersAttached = false;

export function isDBConnected(): boolean {
  return connected;
}

// Index creation runs on every connect; the unique ones back find-or-create
const initializeChatCollections = async (database: Db) => {
  await initializeUserCollection(database);
  await initializeChatThreadCollection(database);
  await initializeChatFileCollection(database);
  await initializeAuthTokenCollection(database);
  console.log("✅ Chat collections and indexes ready");
};

const attachTopologyListeners = () => {
  if (listenersAttached) return;
  listenersAttached = true;

  client.on('serverHeartbeatFailed', (event) => {
    console.warn('⚠️  MongoDB heartbeat failed:', event.failure.message);
  });
  client.on('topologyClosed', () => {
    console.warn('⚠️  MongoDB topology closed');
    connected = false;
  });
};

const openConnection = async (): Promise<Db> => {
  await client.connect();
  const database = client.db(dbName);
  await database.command({ ping: 1 });
  await initializeChatCollections(database);

  chatDb = database;
  connected = true;
  attachTopologyListeners();
  console.log(`✅ Connected to MongoDB database: ${dbName}`);
  return database;
};

const delay = (ms: number) => new Promise(resolve => setTimeout(resolve, ms));

/**
 * Connects with exponential backoff. After the last attempt the service keeps
 * running without a database and retries in the background.
 */
export async function connectDB(): Promise<Db | null> {
  for (let attempt = 1; attempt <= MAX_CONNECT_ATTEMPTS; attempt++) {
    try {
      console.log(`🔄 Connecting to MongoDB (attempt ${attempt}/${MAX_CONNECT_ATTEMPTS})...`);
      return await openConnection();
    } catch (err) {
      connected = false;
      console.error(`❌ MongoDB connection error (attempt ${attempt}):`, err);
      if (attempt < MAX_CONNECT_ATTEMPTS) {
        const retryDelay = Math.min(1000 * 2 ** (attempt - 1), 30000);
        console.log(`🔄 Retrying connection in ${retryDelay / 1000} seconds...`);
        await delay(retryDelay);
      }
    }
  }

  console.warn("⚠️  Max connection attempts reached. Running without database connection.");
  scheduleReconnect();
  return null;
}

function scheduleReconnect() {
  if (reconnectTimer) return;

  reconnectTimer = setInterval(async () => {
    if (connected) return;
    try {
      await openConnection();
      stopReconnect();
      console.log('✅ Reconnected to MongoDB');
    } catch (error) {
      console.log('❌ Reconnection attempt failed, will retry...', error);
    }
  }, RECONNECT_INTERVAL_MS);
  reconnectTimer.unref();
}

function stopReconnect() {
  if (reconnectTimer) {
    clearInterval(reconnectTimer);
    reconnectTimer = null;
  }
}

export async function checkDBHealth(): Promise<boolean> {
  if (!connected || !chatDb) {
    return false;
  }

  try {
    await chatDb.command({ ping: 1 });
    return true;
  } catch (error) {
    console.warn('⚠️  Database health check failed:', error);
    connected = false;
    scheduleReconnect();
    return false;
  }
}

export async function closeDB(): Promise<void> {
  stopReconnect();
  try {
    await client.close();
    connected = false;
    console.log("✅ MongoDB connection closed gracefully");
  } catch (err) {
    console.error("❌ Error closing MongoDB connection:", err);
  }
}
