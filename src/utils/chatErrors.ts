import { Response } from 'express';

export type ChatErrorKind =
  | 'unauthenticated'
  | 'forbidden'
  | 'not_found'
  | 'validation'
  | 'invalid_role'
  | 'upstream';

const STATUS_BY_KIND: Record<ChatErrorKind, number> = {
  unauthenticated: 401,
  forbidden: 403,
  not_found: 404,
  validation: 400,
  invalid_role: 400,
  upstream: 500,
};

const TITLE_BY_KIND: Record<ChatErrorKind, string> = {
  unauthenticated: 'Authentication required',
  forbidden: 'Access denied',
  not_found: 'Not found',
  validation: 'Invalid request',
  invalid_role: 'Invalid role',
  upstream: 'Server error',
};

export class ChatError extends Error {
  readonly kind: ChatErrorKind;

  constructor(kind: ChatErrorKind, message: string) {
    super(message);
    this.name = 'ChatError';
    this.kind = kind;
  }

  get status(): number {
    return STATUS_BY_KIND[this.kind];
  }
}

export const isChatError = (error: unknown): error is ChatError => error instanceof ChatError;

export const isDuplicateKeyError = (error: unknown): boolean =>
  typeof error === 'object' &&
  error !== null &&
  'code' in error &&
  error.code === 11000;

/**
 * Writes the `{ success: false, error, message }` body for a failed request.
 * Anything that is not a ChatError is logged and answered as a generic 500.
 */
export const respondWithError = (res: Response, error: unknown, fallbackMessage: string) => {
  if (isChatError(error)) {
    if (error.kind === 'upstream') {
      console.error(`❌ ${fallbackMessage}:`, error.message);
    }
    return res.status(error.status).json({
      success: false,
      error: TITLE_BY_KIND[error.kind],
      message: error.kind === 'upstream' ? fallbackMessage : error.message,
    });
  }

  console.error(`❌ ${fallbackMessage}:`, error);
  return res.status(500).json({
    success: false,
    error: TITLE_BY_KIND.upstream,
    message: fallbackMessage,
  });
};
