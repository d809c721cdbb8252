import { Request, Response } from 'express';
import { DeliveryNotifier } from '../realtime/deliveryNotifier';
import { parseFileRefs } from '../services/fileReferenceResolver';
import {
  appendMessage,
  markReadOnFetch,
  paginateMessages,
  parseMessagePage,
} from '../services/messageService';
import { getOrCreateThread, getThreadById, listThreadsFor } from '../services/threadStore';
import { ChatUser } from '../types';
import { ChatError, respondWithError } from '../utils/chatErrors';
import { toMessageView, toThreadView } from '../utils/chatSerializers';

export interface ChatControllerDeps {
  notifier: DeliveryNotifier;
}

export const requireIdentity = (req: Request): ChatUser => {
  if (!req.identity) {
    throw new ChatError('unauthenticated', 'Authentication required');
  }
  return req.identity;
};

const readBody = (req: Request): Record<string, unknown> => {
  const body: unknown = req.body;
  if (body === undefined || body === null) return {};
  if (typeof body !== 'object' || Array.isArray(body)) {
    throw new ChatError('validation', 'Request body must be a JSON object');
  }
  return Object.fromEntries(Object.entries(body));
};

export const createChatController = ({ notifier }: ChatControllerDeps) => ({
  // GET /api/chat/threads - All threads for admins, the caller's own thread otherwise
  getThreads: async (req: Request, res: Response) => {
    try {
      const identity = requireIdentity(req);
      const threads = await listThreadsFor(identity);

      console.log(`📚 ${identity.role} ${identity.id} listed ${threads.length} chat thread(s)`);
      res.json({
        success: true,
        threads: threads.map(thread => toThreadView(thread)),
      });
    } catch (error) {
      respondWithError(res, error, 'Failed to fetch chat threads');
    }
  },

  // GET /api/chat/thread/:threadId - Paginated thread; marks the other party's messages read
  getThread: async (req: Request, res: Response) => {
    try {
      const identity = requireIdentity(req);
      const page = parseMessagePage(req.query);
      const stored = await getThreadById(req.params.threadId);
      const { thread } = await markReadOnFetch(stored, identity);

      res.json({
        success: true,
        thread: toThreadView(thread, paginateMessages(thread.messages, page)),
      });
    } catch (error) {
      respondWithError(res, error, 'Failed to fetch chat thread');
    }
  },

  // POST /api/chat/thread - Idempotent: returns the existing thread when there is one
  createThread: async (req: Request, res: Response) => {
    try {
      const identity = requireIdentity(req);
      const { thread, created } = await getOrCreateThread(identity);

      res.status(created ? 201 : 200).json({
        success: true,
        thread: toThreadView(thread),
      });
    } catch (error) {
      respondWithError(res, error, 'Failed to create chat thread');
    }
  },

  // POST /api/chat/thread/:threadId/message - Append a message and push it live
  sendMessage: async (req: Request, res: Response) => {
    try {
      const identity = requireIdentity(req);
      const body = readBody(req);
      const fileRefs = parseFileRefs(body.files);
      const thread = await getThreadById(req.params.threadId);

      const message = await appendMessage(notifier, {
        thread,
        sender: identity,
        content: body.content,
        fileRefs,
      });

      res.status(201).json({
        success: true,
        status: 'Message added successfully',
        thread_id: thread._id.toHexString(),
        message: toMessageView(message),
      });
    } catch (error) {
      respondWithError(res, error, 'Failed to send message');
    }
  },

  // PUT /api/chat/thread/:threadId/read - Read transition without fetching the thread
  markThreadRead: async (req: Request, res: Response) => {
    try {
      const identity = requireIdentity(req);
      const stored = await getThreadById(req.params.threadId);
      const { didMutate } = await markReadOnFetch(stored, identity);

      res.json({
        success: true,
        thread_id: stored._id.toHexString(),
        updated: didMutate,
      });
    } catch (error) {
      respondWithError(res, error, 'Failed to mark messages as read');
    }
  },
});

export type ChatController = ReturnType<typeof createChatController>;
