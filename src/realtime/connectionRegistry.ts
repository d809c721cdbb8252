import { MessageView } from '../utils/chatSerializers';

export interface NewMessageFrame {
  type: 'new_message';
  thread_id: string;
  message: MessageView;
}

export type ChatServerFrame =
  | { type: 'connection_established'; user_id: string; is_admin: boolean; timestamp: string }
  | { type: 'pong' }
  | NewMessageFrame;

/** A live, push-capable connection to one client. */
export interface ChatChannel {
  readonly id: string;
  send(frame: ChatServerFrame): void | Promise<void>;
  close(reason?: string): void;
}

const DEFAULT_SEND_TIMEOUT_MS = 1000;

const withTimeout = async <T>(work: Promise<T>, timeoutMs: number): Promise<T> => {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new Error(`Send timed out after ${timeoutMs}ms`)), timeoutMs);
  });

  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
};

/**
 * Live channels keyed by user id, with admins also tracked on their own.
 *
 * Every mutation below runs without yielding to the event loop, so the maps
 * are never observed half-updated. Sends snapshot the channel they target and
 * only drop it afterwards if it is still the registered one.
 */
export class ConnectionRegistry {
  private readonly channels = new Map<string, ChatChannel>();
  private readonly adminChannels = new Map<string, ChatChannel>();
  private readonly sendTimeoutMs: number;

  constructor(options: { sendTimeoutMs?: number } = {}) {
    this.sendTimeoutMs = options.sendTimeoutMs ?? DEFAULT_SEND_TIMEOUT_MS;
  }

  register(channel: ChatChannel, userId: string, isAdmin: boolean): void {
    const previous = this.channels.get(userId);
    if (previous && previous.id !== channel.id) {
      previous.close('Replaced by a newer connection');
    }

    this.channels.set(userId, channel);
    if (isAdmin) {
      this.adminChannels.set(userId, channel);
    } else {
      this.adminChannels.delete(userId);
    }

    console.log(`🔌 User ${userId}${isAdmin ? ' (admin)' : ''} connected to chat`);
  }

  /**
   * Removes the user from both maps. With `channelId`, the removal only
   * happens while that channel is still the registered one, so a late
   * disconnect of a replaced channel leaves its successor alone.
   */
  unregister(userId: string, channelId?: string): void {
    const current = this.channels.get(userId);
    if (channelId !== undefined && current && current.id !== channelId) {
      return;
    }

    const removed = this.channels.delete(userId);
    this.adminChannels.delete(userId);
    if (removed) {
      console.log(`❌ User ${userId} disconnected from chat`);
    }
  }

  isConnected(userId: string): boolean {
    return this.channels.has(userId);
  }

  get connectionCount(): number {
    return this.channels.size;
  }

  get adminCount(): number {
    return this.adminChannels.size;
  }

  /** Offline users are a silent no-op: resolves false, never rejects. */
  async sendTo(userId: string, frame: ChatServerFrame): Promise<boolean> {
    const channel = this.channels.get(userId);
    if (!channel) {
      console.log(`📭 User ${userId} not connected, message not pushed`);
      return false;
    }
    return this.deliver(userId, channel, frame);
  }

  /** Resolves with the number of admin channels that took the frame. */
  async broadcastToAdmins(frame: ChatServerFrame): Promise<number> {
    const targets = Array.from(this.adminChannels.entries());
    const results = await Promise.all(
      targets.map(([adminId, channel]) => this.deliver(adminId, channel, frame))
    );
    return results.filter(Boolean).length;
  }

  closeAll(reason = 'Server shutting down'): void {
    for (const channel of this.channels.values()) {
      channel.close(reason);
    }
    this.channels.clear();
    this.adminChannels.clear();
  }

  private async deliver(userId: string, channel: ChatChannel, frame: ChatServerFrame): Promise<boolean> {
    try {
      await withTimeout(Promise.resolve().then(() => channel.send(frame)), this.sendTimeoutMs);
      return true;
    } catch (error) {
      console.error(`❌ Error pushing ${frame.type} to user ${userId}:`, error instanceof Error ? error.message : error);
      // A channel that cannot take a frame is treated as gone
      this.unregister(userId, channel.id);
      channel.close('Delivery failed');
      return false;
    }
  }
}
