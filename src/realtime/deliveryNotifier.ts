import { IChatThread } from '../models/ChatThread';
import { ChatMessage } from '../types';
import { toMessageView } from '../utils/chatSerializers';
import { ConnectionRegistry, NewMessageFrame } from './connectionRegistry';
import { GatewayRelay, RelayTarget } from './gatewayRelay';

export interface DeliveryOutcome {
  route: 'direct' | 'admins';
  delivered: number;
}

export const buildNewMessageFrame = (threadId: string, message: ChatMessage): NewMessageFrame => ({
  type: 'new_message',
  thread_id: threadId,
  message: toMessageView(message),
});

/**
 * Pushes freshly stored messages to whoever should see them live: an admin's
 * message goes to the thread owner, a customer's message to every connected
 * admin. The same frame is handed to the gateway relay either way.
 */
export class DeliveryNotifier {
  constructor(
    private readonly registry: ConnectionRegistry,
    private readonly relay: GatewayRelay
  ) {}

  async notify(threadId: string, thread: Pick<IChatThread, 'userId'>, message: ChatMessage): Promise<DeliveryOutcome> {
    const frame = buildNewMessageFrame(threadId, message);

    let outcome: DeliveryOutcome;
    let target: RelayTarget;
    if (message.senderRole === 'admin') {
      const delivered = await this.registry.sendTo(thread.userId, frame);
      outcome = { route: 'direct', delivered: delivered ? 1 : 0 };
      target = { user_id: thread.userId };
    } else {
      const delivered = await this.registry.broadcastToAdmins(frame);
      outcome = { route: 'admins', delivered };
      target = { role: 'admin' };
    }

    this.relay.enqueue({ target, frame });
    return outcome;
  }
}
