import { NegotiationError } from '../errors/index.js';
import { NODE_ID_BYTES, type NodeId, randomHex } from '../identity/node-id.js';
import type { Role } from '../types/index.js';

/**
 * Assign a negotiation role using the node ids both sides already know.
 *
 * Consensus rule: the lower id (lexicographic) is impolite, the higher is
 * polite. Both ends compute the same answer without exchanging anything,
 * so the two roles always differ.
 */
export function assignRole(localNodeId: NodeId, remoteNodeId: NodeId): Role {
  if (localNodeId === remoteNodeId) {
    throw new NegotiationError('ROLE_CONFLICT', 'Both endpoints share the same node id', {
      nodeId: localNodeId,
    });
  }
  return localNodeId < remoteNodeId ? 'impolite' : 'polite';
}

/** Random value for the nonce-exchange convention. */
export function createRoleNonce(): string {
  return randomHex(NODE_ID_BYTES);
}

/**
 * Tie-broken random exchange: each side sends a nonce from
 * {@link createRoleNonce} and the lower one becomes impolite.
 * Equal nonces are a conflict; both sides should draw again.
 */
export function assignRoleByNonce(localNonce: string, remoteNonce: string): Role {
  if (localNonce === remoteNonce) {
    throw new NegotiationError('ROLE_CONFLICT', 'Role nonces collided, draw again', { nonce: localNonce });
  }
  return localNonce < remoteNonce ? 'impolite' : 'polite';
}

/** Roles for both parties at once, keyed by node id. */
export function assignRoles(a: NodeId, b: NodeId): Map<NodeId, Role> {
  return new Map<NodeId, Role>([
    [a, assignRole(a, b)],
    [b, assignRole(b, a)],
  ]);
}
