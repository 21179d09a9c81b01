export type BotErrorKind = 'validation' | 'conflict' | 'not-found' | 'upstream';

/**
 * Failure that is reported back to the channel that caused it.
 * Command handlers throw these; the command processor turns them into replies.
 */
export class BotError extends Error {
  constructor(
    readonly kind: BotErrorKind,
    message: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends BotError {
  constructor(message: string) {
    super('validation', message);
  }
}

export class ConflictError extends BotError {
  constructor(message: string) {
    super('conflict', message);
  }
}

export class NotFoundError extends BotError {
  constructor(message: string) {
    super('not-found', message);
  }
}

export class UpstreamError extends BotError {
  constructor(
    message: string,
    readonly status?: number
  ) {
    super('upstream', message);
  }
}

export function isBotError(error: unknown): error is BotError {
  return error instanceof BotError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
