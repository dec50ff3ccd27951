// Error taxonomy shared by the tutor core and the chat transports

export class ConfigurationError extends Error {
  constructor(
    message: string,
    public context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class CompletionError extends Error {
  constructor(
    message: string,
    public context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'CompletionError';
  }
}

export class CompletionTimeoutError extends CompletionError {
  constructor(
    public timeoutMs: number,
    context?: Record<string, unknown>
  ) {
    super(`Completion timed out after ${timeoutMs}ms`, context);
    this.name = 'CompletionTimeoutError';
  }
}

export class UnsupportedAttachmentError extends Error {
  constructor(
    message: string,
    public mimeType: string | undefined,
    public context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'UnsupportedAttachmentError';
  }
}

export class AttachmentProcessingError extends Error {
  constructor(
    message: string,
    public filename: string,
    public context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AttachmentProcessingError';
  }
}

/**
 * Extract error message from any error type
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
