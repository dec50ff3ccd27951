import { describe, it, expect } from 'vitest';
import {
  AttachmentProcessingError,
  CompletionError,
  CompletionTimeoutError,
  getErrorMessage,
  UnsupportedAttachmentError,
} from '../src/index.js';

describe('error types', () => {
  it('names each error class', () => {
    expect(new UnsupportedAttachmentError('nope', 'text/plain').name).toBe(
      'UnsupportedAttachmentError'
    );
    expect(new AttachmentProcessingError('broken', 'a.pdf').filename).toBe('a.pdf');
  });

  it('treats timeouts as completion errors', () => {
    const error = new CompletionTimeoutError(30000, { userId: '42' });

    expect(error).toBeInstanceOf(CompletionError);
    expect(error.message).toBe('Completion timed out after 30000ms');
    expect(error.context).toEqual({ userId: '42' });
  });

  it('extracts messages from anything thrown', () => {
    expect(getErrorMessage(new Error('boom'))).toBe('boom');
    expect(getErrorMessage('plain')).toBe('plain');
    expect(getErrorMessage(404)).toBe('404');
  });
});

