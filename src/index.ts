import dotenv from 'dotenv';
import { Server as SocketIOServer } from 'socket.io';
import { createApp, parseAllowedOrigins } from './app';
import { connectDB, checkDBHealth, closeDB, isDBConnected } from './db';
import { createIdentityResolver } from './services/identityResolver';
import { createBlobStoreFromEnv } from './services/blobStore';
import { ConnectionRegistry } from './realtime/connectionRegistry';
import { DeliveryNotifier } from './realtime/deliveryNotifier';
import { createGatewayRelayFromEnv } from './realtime/gatewayRelay';
import {
  attachChatSocket,
  ChatSocketData,
  ClientToServerEvents,
  InterServerEvents,
  ServerToClientEvents,
} from './realtime/socketHub';

dotenv.config();

const PORT = Number(process.env.PORT) || 5000;

const resolveIdentity = createIdentityResolver();
const registry = new ConnectionRegistry({
  sendTimeoutMs: Number(process.env.CHAT_SEND_TIMEOUT_MS) || 1000,
});
const relay = createGatewayRelayFromEnv();
const notifier = new DeliveryNotifier(registry, relay);

const app = createApp({
  resolveIdentity,
  registry,
  notifier,
  blobStore: createBlobStoreFromEnv(),
});

async function startServer() {
  try {
    console.log('🚀 Starting tailoring chat backend...');
    console.log(`📍 Environment: ${process.env.NODE_ENV || 'development'}`);
    console.log(`🔧 Port: ${PORT}`);
    if (!relay.enabled) {
      console.warn('⚠️ CHAT_GATEWAY_URL not set. Gateway relay is disabled.');
    }

    const db = await connectDB();
    if (!db) {
      if (process.env.NODE_ENV === 'production') {
        throw new Error('Database connection is required in production.');
      }
      console.warn('⚠️  Database connection not available. Chat requests will fail until DB reconnects.');
    }

    const server = app.listen(PORT, () => {
      console.log(`🚀 Server is running on port ${PORT}`);
      console.log(`🌐 Health check available at: http://localhost:${PORT}/health`);
    });

    const io = new SocketIOServer<ClientToServerEvents, ServerToClientEvents, InterServerEvents, ChatSocketData>(server, {
      cors: {
        origin: parseAllowedOrigins(process.env.CORS_ORIGINS),
        credentials: true,
        methods: ["GET", "POST"],
      },
      path: '/socket.io/',
      pingInterval: 25000,
      pingTimeout: 20000,
    });
    attachChatSocket(io, registry, resolveIdentity);

    const healthInterval = setInterval(async () => {
      const isHealthy = await checkDBHealth();
      if (!isHealthy && isDBConnected()) {
        console.warn('⚠️  Database health check failed - connection may be unstable');
      }
    }, 60000);
    healthInterval.unref();

    const gracefulShutdown = (signal: string) => {
      console.log(`\n🔄 Received ${signal}. Shutting down gracefully...`);
      clearInterval(healthInterval);
      registry.closeAll();
      io.close(() => {
        console.log('✅ Socket server closed');
      });
      server.close(async () => {
        console.log('✅ HTTP server closed');
        await relay.flush();
        await closeDB();
        process.exit(0);
      });
    };

    process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
    process.on('SIGINT', () => gracefulShutdown('SIGINT'));
  } catch (error) {
    console.error('❌ Failed to start server:', error);
    process.exit(1);
  }
}

process.on('unhandledRejection', (reason) => {
  console.error('❌ Unhandled Rejection:', reason);
});

export { app };

if (process.env.NODE_ENV !== 'test') {
  void startServer();
}
