import { Session } from '../../core/entities/Session.js';
import { Message, MessageContext, MessageStatus, ResumeResult, Sender } from '../../core/entities/Message.js';

export interface SessionResponse {
  id: string;
  user_id: string;
  name: string;
  is_favorite: boolean;
  created_at: string;
  updated_at: string;
}

export interface MessageResponse {
  id: string;
  session_id: string;
  sender: Sender;
  content: string;
  context: MessageContext | null;
  status: MessageStatus;
  partial_content: string | null;
  error_message: string | null;
  timestamp: string;
  created_at: string;
  updated_at: string;
}

export function serializeSession(session: Session): SessionResponse {
  return {
    id: session.id,
    user_id: session.userId,
    name: session.name,
    is_favorite: session.isFavorite,
    created_at: session.createdAt.toISOString(),
    updated_at: session.updatedAt.toISOString(),
  };
}

export function serializeMessage(message: Message): MessageResponse {
  return {
    id: message.id,
    session_id: message.sessionId,
    sender: message.sender,
    content: message.content,
    context: message.context ?? null,
    status: message.status,
    partial_content: message.partialContent ?? null,
    error_message: message.errorMessage ?? null,
    timestamp: message.timestamp.toISOString(),
    created_at: message.createdAt.toISOString(),
    updated_at: message.updatedAt.toISOString(),
  };
}

export function serializeResume(result: ResumeResult): { message_id: string; status: MessageStatus } {
  return { message_id: result.messageId, status: result.status };
}
