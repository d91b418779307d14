/**
 * Session domain entity
 */
export interface Session {
  id: string;
  userId: string;
  name: string;
  isFavorite: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export const DEFAULT_SESSION_NAME = 'New Chat';

export interface NewSession {
  userId: string;
  name?: string;
  isFavorite?: boolean;
}

/**
 * Fields a session update may assign. `userId` is fixed at creation.
 */
export interface SessionUpdateFields {
  name?: string;
  isFavorite?: boolean;
}

export interface SessionFilters {
  userId?: string;
  isFavorite?: boolean;
}
