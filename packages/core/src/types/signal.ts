/** Negotiation role, fixed for the lifetime of an endpoint. */
export type Role = 'polite' | 'impolite';

export type SignalingState =
  | 'stable'
  | 'have-local-offer'
  | 'have-remote-offer'
  | 'have-local-pranswer'
  | 'have-remote-pranswer'
  | 'closed';

export type DescriptionType = 'offer' | 'answer' | 'pranswer' | 'rollback';

export interface SessionDescription {
  readonly type: DescriptionType;
  readonly sdp: string;
}

/**
 * A discovered network path. `usernameFragment` ties the candidate to the
 * offer/answer exchange that produced it.
 */
export interface ConnectivityCandidate {
  readonly candidate: string;
  readonly sdpMid: string | null;
  readonly sdpMLineIndex: number | null;
  readonly usernameFragment: string | null;
}

export interface DescriptionMessage {
  description: SessionDescription;
  candidate?: never;
}

/** `candidate: null` marks the end of the sender's candidates. */
export interface CandidateMessage {
  candidate: ConnectivityCandidate | null;
  description?: never;
}

export type SignalingMessage = DescriptionMessage | CandidateMessage;

export const DESCRIPTION_TYPES: readonly DescriptionType[] = ['offer', 'answer', 'pranswer', 'rollback'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNullableString(value: unknown): value is string | null {
  return value === null || typeof value === 'string';
}

export function isDescriptionType(value: unknown): value is DescriptionType {
  return typeof value === 'string' && (DESCRIPTION_TYPES as readonly string[]).includes(value);
}

export function isSessionDescription(value: unknown): value is SessionDescription {
  return isRecord(value) && isDescriptionType(value.type) && typeof value.sdp === 'string';
}

export function isConnectivityCandidate(value: unknown): value is ConnectivityCandidate {
  if (!isRecord(value)) return false;
  const index = value.sdpMLineIndex;
  return (
    typeof value.candidate === 'string' &&
    isNullableString(value.sdpMid) &&
    (index === null || (typeof index === 'number' && Number.isInteger(index) && index >= 0)) &&
    isNullableString(value.usernameFragment)
  );
}

/** Exactly one of `description` or `candidate` must be present. */
export function isSignalingMessage(value: unknown): value is SignalingMessage {
  if (!isRecord(value)) return false;
  const hasDescription = 'description' in value && value.description !== undefined;
  const hasCandidate = 'candidate' in value && value.candidate !== undefined;
  if (hasDescription === hasCandidate) return false;
  if (hasDescription) return isSessionDescription(value.description);
  return value.candidate === null || isConnectivityCandidate(value.candidate);
}

export function isDescriptionMessage(message: SignalingMessage): message is DescriptionMessage {
  return message.description !== undefined;
}
