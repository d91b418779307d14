/**
 * Message domain entity
 */
export const MESSAGE_STATUSES = ['pending', 'in_progress', 'complete', 'failed'] as const;
export type MessageStatus = (typeof MESSAGE_STATUSES)[number];

export const SENDERS = ['user', 'ai'] as const;
export type Sender = (typeof SENDERS)[number];

/** Statuses from which a message may be put back to pending. */
export const RESUMABLE_STATUSES: readonly MessageStatus[] = ['pending', 'failed'];

export type MessageContext = Record<string, unknown>;

export interface Message {
  id: string;
  sessionId: string;
  sender: Sender;
  content: string;
  context?: MessageContext;
  status: MessageStatus;
  partialContent?: string;
  errorMessage?: string;
  timestamp: Date; // logical message time, used for ordering
  createdAt: Date;
  updatedAt: Date;
}

export interface NewMessage {
  sessionId: string;
  sender: Sender;
  content: string;
  context?: MessageContext;
  status?: MessageStatus;
  partialContent?: string;
  errorMessage?: string;
  timestamp?: Date;
}

/**
 * Sparse message update. `null` clears an optional column.
 */
export interface MessageUpdateFields {
  content?: string;
  context?: MessageContext | null;
  status?: MessageStatus;
  partialContent?: string | null;
  errorMessage?: string | null;
}

export interface MessageFilters {
  sessionId?: string;
  sender?: Sender;
  status?: MessageStatus;
}

export interface ResumeResult {
  messageId: string;
  status: MessageStatus;
}
