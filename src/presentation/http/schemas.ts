import { z } from 'zod';
import { MESSAGE_STATUSES, SENDERS } from '../../core/entities/Message.js';

export const MAX_CONTENT_LENGTH = 10000;

const uuid = z.string().uuid();

const booleanString = z
  .string()
  .transform((value) => value.trim().toLowerCase())
  .pipe(z.enum(['true', 'false', '1', '0', 'yes', 'no', 'on', 'off']))
  .transform((value) => value === 'true' || value === '1' || value === 'yes' || value === 'on');

export const SessionParams = z.object({
  sessionId: uuid,
});

export const MessageParams = z.object({
  sessionId: uuid,
  messageId: uuid,
});

export const PaginationQuery = z.object({
  skip: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(1000).default(100),
});

export const ListSessionsQuery = PaginationQuery.extend({
  user_id: uuid,
});

export const FavoriteQuery = z.object({
  is_favorite: booleanString,
});

export const CreateSessionBody = z.object({
  user_id: uuid,
  name: z.string().nullish(),
  is_favorite: z.boolean().nullish(),
});

export const UpdateSessionBody = z.object({
  name: z.string({
    required_error: 'Name is required for update',
    invalid_type_error: 'Name must be a string',
  }),
});

export const CreateMessageBody = z.object({
  sender: z.enum(SENDERS),
  content: z.string().min(1).max(MAX_CONTENT_LENGTH),
  context: z.record(z.string(), z.unknown()).nullish(),
  timestamp: z
    .string()
    .datetime({ offset: true })
    .transform((value) => new Date(value))
    .optional(),
});

export const UpdateMessageStatusBody = z.object({
  status: z.enum(MESSAGE_STATUSES),
  error_message: z.string().max(MAX_CONTENT_LENGTH).nullish(),
});
