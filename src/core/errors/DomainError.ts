/**
 * Business-rule violations raised by the service layer.
 * The HTTP boundary maps these to 4xx responses.
 */
export class DomainError extends Error {
  constructor(
    message: string,
    public readonly code: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class SessionNotFoundError extends DomainError {
  constructor(public readonly sessionId: string) {
    super(`Session ${sessionId} not found`, 'session_not_found');
  }
}

export class NoMessagesFoundError extends DomainError {
  constructor(public readonly sessionId: string) {
    super(`No messages found for session ${sessionId}`, 'no_messages_found');
  }
}

export class MessageNotResumableError extends DomainError {
  constructor(
    public readonly messageId: string,
    public readonly status: string
  ) {
    super('Latest message is not in a resumable state', 'message_not_resumable');
  }
}

export class InvalidSessionNameError extends DomainError {
  constructor() {
    super('Session name must not be blank', 'invalid_session_name');
  }
}
