import { Server as SocketIOServer, Socket } from 'socket.io';
import { IdentityResolver } from '../services/identityResolver';
import { ChatUser } from '../types';
import { isChatError } from '../utils/chatErrors';
import { ChatChannel, ChatServerFrame, ConnectionRegistry } from './connectionRegistry';

export const POLICY_VIOLATION = 1008;
export const CHAT_NAMESPACE = /^\/chat\/[A-Za-z0-9_-]+$/;

export interface ClientToServerEvents {
  message: (frame: unknown) => void;
}

export interface ServerToClientEvents {
  message: (frame: ChatServerFrame) => void;
}

// No server-to-server events: there is a single process
export interface InterServerEvents {}

export interface ChatSocketData {
  identity: ChatUser;
  isAdmin: boolean;
}

export type ChatSocketServer = SocketIOServer<ClientToServerEvents, ServerToClientEvents, InterServerEvents, ChatSocketData>;
type ChatSocket = Socket<ClientToServerEvents, ServerToClientEvents, InterServerEvents, ChatSocketData>;

export interface ChatHandshake {
  userId: string;
  role?: string;
  token?: string;
}

export class SocketRejection extends Error {
  readonly data = { code: POLICY_VIOLATION, reason: 'Unauthorized' };

  constructor(message: string) {
    super(message);
    this.name = 'SocketRejection';
  }
}

/**
 * The credential must resolve to the user named in the namespace path, and
 * an admin claim must be backed by the stored role.
 */
export const authorizeChatHandshake = async (
  handshake: ChatHandshake,
  resolveIdentity: IdentityResolver
): Promise<ChatSocketData> => {
  if (!handshake.token) {
    throw new SocketRejection('Authentication token missing');
  }

  let identity: ChatUser;
  try {
    identity = await resolveIdentity(handshake.token);
  } catch (error) {
    if (isChatError(error) && error.kind === 'unauthenticated') {
      throw new SocketRejection('Invalid authentication token');
    }
    throw error;
  }

  if (identity.id !== handshake.userId) {
    throw new SocketRejection(`Token does not belong to user ${handshake.userId}`);
  }

  const isAdmin = handshake.role === 'admin';
  if (isAdmin && identity.role !== 'admin') {
    throw new SocketRejection(`User ${handshake.userId} claims admin but is not an admin`);
  }

  return { identity, isAdmin };
};

/** Only `ping` gets an answer; every other frame is ignored. */
export const replyToClientFrame = (frame: unknown): ChatServerFrame | null => {
  let parsed: unknown = frame;
  if (typeof frame === 'string') {
    try {
      parsed = JSON.parse(frame);
    } catch {
      return null;
    }
  }

  if (typeof parsed === 'object' && parsed !== null && 'type' in parsed && parsed.type === 'ping') {
    return { type: 'pong' };
  }
  return null;
};

const firstString = (value: unknown): string | undefined => {
  if (Array.isArray(value)) return firstString(value[0]);
  return typeof value === 'string' && value.length > 0 ? value : undefined;
};

const readHandshake = (socket: ChatSocket): ChatHandshake => {
  const auth: unknown = socket.handshake.auth;
  const authToken = typeof auth === 'object' && auth !== null && 'token' in auth ? firstString(auth.token) : undefined;

  return {
    userId: socket.nsp.name.slice('/chat/'.length),
    role: firstString(socket.handshake.query.role),
    token: authToken || firstString(socket.handshake.query.token),
  };
};

const toChannel = (socket: ChatSocket): ChatChannel => ({
  id: socket.id,
  send(frame) {
    if (!socket.connected) {
      throw new Error('Socket is no longer connected');
    }
    socket.emit('message', frame);
  },
  close() {
    socket.disconnect(true);
  },
});

/**
 * Live chat channels live on `/chat/<userId>` namespaces. Apart from
 * answering pings, a connection only does registry bookkeeping.
 */
export const attachChatSocket = (
  io: ChatSocketServer,
  registry: ConnectionRegistry,
  resolveIdentity: IdentityResolver
) => {
  const chat = io.of(CHAT_NAMESPACE);

  chat.use((socket, next) => {
    const handshake = readHandshake(socket);
    authorizeChatHandshake(handshake, resolveIdentity)
      .then(data => {
        socket.data = data;
        next();
      })
      .catch((error: unknown) => {
        if (error instanceof SocketRejection) {
          console.warn(`⚠️ Chat socket rejected for ${handshake.userId}: ${error.message}`);
          next(error);
          return;
        }
        console.error('❌ Chat socket authentication error:', error);
        next(new Error('Internal error'));
      });
  });

  chat.on('connection', socket => {
    const { identity, isAdmin } = socket.data;
    const channel = toChannel(socket);

    registry.register(channel, identity.id, isAdmin);
    socket.emit('message', {
      type: 'connection_established',
      user_id: identity.id,
      is_admin: isAdmin,
      timestamp: new Date().toISOString(),
    });

    socket.on('message', frame => {
      const reply = replyToClientFrame(frame);
      if (reply) {
        socket.emit('message', reply);
      }
    });

    socket.on('disconnect', reason => {
      registry.unregister(identity.id, channel.id);
      console.log(`❌ Chat socket ${socket.id} closed (${reason})`);
    });
  });

  return chat;
};
