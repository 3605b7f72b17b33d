import { NegotiationError } from '../errors/index.js';
import { type SignalingMessage, isSignalingMessage } from '../types/index.js';

export function encodeSignal(message: SignalingMessage): string {
  return JSON.stringify(message);
}

/** Parse and validate a signaling message received as text or as an already-parsed value. */
export function decodeSignal(raw: unknown): SignalingMessage {
  let value = raw;
  if (typeof raw === 'string') {
    try {
      value = JSON.parse(raw);
    } catch (err) {
      throw new NegotiationError('INVALID_MESSAGE', 'Signaling message is not valid JSON', undefined, err);
    }
  }
  if (!isSignalingMessage(value)) {
    throw new NegotiationError('INVALID_MESSAGE', 'Malformed signaling message', { received: value });
  }
  return value;
}
