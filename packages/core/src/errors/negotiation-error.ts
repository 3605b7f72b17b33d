export type NegotiationErrorCode =
  | 'ROLE_CONFLICT'
  | 'INVALID_STATE'
  | 'INVALID_MESSAGE'
  | 'GENERATION_FAILED'
  | 'TRANSPORT_FAILED'
  | 'CANDIDATE_REJECTED'
  | 'DESCRIPTION_REJECTED'
  | 'ENDPOINT_CLOSED'
  | 'SIGNALING_FAILED';

export class NegotiationError extends Error {
  readonly code: NegotiationErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: NegotiationErrorCode, message: string, context?: Record<string, unknown>, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'NegotiationError';
    this.code = code;
    this.context = context;
  }
}

export function isNegotiationError(error: unknown): error is NegotiationError {
  return error instanceof NegotiationError;
}
