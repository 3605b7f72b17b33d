import { describe, expect, it } from 'vitest';
import { NegotiationError, isNegotiationError } from './negotiation-error.js';
import type { NegotiationErrorCode } from './negotiation-error.js';

describe('NegotiationError', () => {
  it('extends Error', () => {
    const error = new NegotiationError('TRANSPORT_FAILED', 'socket closed');
    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(NegotiationError);
  });

  it('has correct name, code, and message', () => {
    const error = new NegotiationError('INVALID_STATE', 'cannot roll back');
    expect(error.name).toBe('NegotiationError');
    expect(error.code).toBe('INVALID_STATE');
    expect(error.message).toBe('cannot roll back');
  });

  it('supports optional context', () => {
    const error = new NegotiationError('INVALID_MESSAGE', 'missing field', { field: 'description' });
    expect(error.context).toEqual({ field: 'description' });
  });

  it('context and cause are undefined when not provided', () => {
    const error = new NegotiationError('ROLE_CONFLICT', 'same id');
    expect(error.context).toBeUndefined();
    expect(error.cause).toBeUndefined();
  });

  it('keeps the underlying cause', () => {
    const cause = new Error('boom');
    const error = new NegotiationError('GENERATION_FAILED', 'offer failed', undefined, cause);
    expect(error.cause).toBe(cause);
  });

  it('supports all error codes', () => {
    const codes: NegotiationErrorCode[] = [
      'ROLE_CONFLICT',
      'INVALID_STATE',
      'INVALID_MESSAGE',
      'GENERATION_FAILED',
      'TRANSPORT_FAILED',
      'CANDIDATE_REJECTED',
      'DESCRIPTION_REJECTED',
      'ENDPOINT_CLOSED',
      'SIGNALING_FAILED',
    ];
    for (const code of codes) {
      expect(new NegotiationError(code, 'test').code).toBe(code);
    }
  });

  it('is recognised by the type guard', () => {
    expect(isNegotiationError(new NegotiationError('ENDPOINT_CLOSED', 'closed'))).toBe(true);
    expect(isNegotiationError(new Error('plain'))).toBe(false);
    expect(isNegotiationError('string')).toBe(false);
  });
});
