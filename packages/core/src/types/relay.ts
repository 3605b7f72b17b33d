import type { NodeId } from '../identity/node-id.js';

export interface Participant {
  nodeId: NodeId;
}

export type RelayMessageType = 'register' | 'signal' | 'participants' | 'presence' | 'error';

/** Envelope exchanged between clients and the relay server. */
export interface RelayMessage {
  type: RelayMessageType;
  from?: NodeId;
  to?: NodeId;
  nodeId?: NodeId;
  participants?: Participant[];
  action?: 'join' | 'leave';
  /** For `signal`: a signaling message, relayed without inspection */
  payload?: unknown;
  error?: string;
}

const RELAY_MESSAGE_TYPES: readonly string[] = ['register', 'signal', 'participants', 'presence', 'error'];

export function isRelayMessageType(value: unknown): value is RelayMessageType {
  return typeof value === 'string' && RELAY_MESSAGE_TYPES.includes(value);
}

function isOptionalString(value: unknown): boolean {
  return value === undefined || typeof value === 'string';
}

function isParticipant(value: unknown): value is Participant {
  return typeof value === 'object' && value !== null && 'nodeId' in value && typeof value.nodeId === 'string';
}

/** Known `type` and, where present, well-typed addressing, presence and participant fields. */
export function isRelayMessage(value: unknown): value is RelayMessage {
  if (typeof value !== 'object' || value === null || !('type' in value) || !isRelayMessageType(value.type)) {
    return false;
  }
  const fields: Record<string, unknown> = { ...value };
  return (
    isOptionalString(fields.from) &&
    isOptionalString(fields.to) &&
    isOptionalString(fields.nodeId) &&
    isOptionalString(fields.error) &&
    (fields.action === undefined || fields.action === 'join' || fields.action === 'leave') &&
    (fields.participants === undefined ||
      (Array.isArray(fields.participants) && fields.participants.every(isParticipant)))
  );
}
