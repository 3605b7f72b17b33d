/**
 * SIGNALING STATE MACHINE
 *
 * Pure transition functions for one endpoint's offer/answer state.
 * Nothing here performs I/O; the endpoint asks for the next state first and
 * only then touches the session layer, so a remote offer that supersedes a
 * local one is a single transition (have-local-offer -> have-remote-offer)
 * instead of a rollback followed by an apply.
 *
 * @module negotiation
 */

import type { DescriptionType, Role, SignalingState } from '../types/index.js';

export type DescriptionSide = 'local' | 'remote';

export type TransitionResult =
  | { ok: true; state: SignalingState; rolledBack: boolean }
  | { ok: false; reason: string };

export interface OfferEvaluation {
  offerCollision: boolean;
  ignoreOffer: boolean;
}

export interface InboundContext {
  state: SignalingState;
  role: Role;
  makingOffer: boolean;
}

export type InboundDecision =
  | ({ kind: 'ignore' } & OfferEvaluation)
  | ({ kind: 'apply'; state: SignalingState; rolledBack: boolean } & OfferEvaluation)
  | ({ kind: 'reject'; reason: string } & OfferEvaluation);

function accept(state: SignalingState, rolledBack = false): TransitionResult {
  return { ok: true, state, rolledBack };
}

function reject(state: SignalingState, side: DescriptionSide, type: DescriptionType): TransitionResult {
  return { ok: false, reason: `Cannot set ${side} ${type} in state ${state}` };
}

function applyRollback(state: SignalingState, side: DescriptionSide): TransitionResult {
  switch (state) {
    case 'stable':
      return accept('stable');
    case 'have-local-offer':
    case 'have-remote-offer':
      return accept('stable', true);
    default:
      return { ok: false, reason: `Cannot set ${side} rollback in state ${state}` };
  }
}

/**
 * Next signaling state after setting a description of `type` on `side`.
 *
 * A remote offer received in `have-local-offer` rolls the local offer back
 * implicitly (`rolledBack: true`). Rollback is refused in either pranswer
 * state and every transition is refused once `closed`.
 */
export function applyDescription(state: SignalingState, side: DescriptionSide, type: DescriptionType): TransitionResult {
  if (state === 'closed') {
    return { ok: false, reason: 'Endpoint is closed' };
  }

  if (type === 'rollback') {
    return applyRollback(state, side);
  }

  if (side === 'local') {
    switch (type) {
      case 'offer':
        return state === 'stable' || state === 'have-local-offer' ? accept('have-local-offer') : reject(state, side, type);
      case 'answer':
        return state === 'have-remote-offer' || state === 'have-local-pranswer'
          ? accept('stable')
          : reject(state, side, type);
      case 'pranswer':
        return state === 'have-remote-offer' || state === 'have-local-pranswer'
          ? accept('have-local-pranswer')
          : reject(state, side, type);
    }
  }

  switch (type) {
    case 'offer':
      if (state === 'stable' || state === 'have-remote-offer') return accept('have-remote-offer');
      if (state === 'have-local-offer') return accept('have-remote-offer', true);
      return { ok: false, reason: `Cannot roll back from ${state} to accept a remote offer` };
    case 'answer':
      return state === 'have-local-offer' || state === 'have-remote-pranswer'
        ? accept('stable')
        : reject(state, side, type);
    case 'pranswer':
      return state === 'have-local-offer' || state === 'have-remote-pranswer'
        ? accept('have-remote-pranswer')
        : reject(state, side, type);
  }
}

export function evaluateOffer(context: InboundContext): OfferEvaluation {
  const offerCollision = context.makingOffer || context.state !== 'stable';
  return {
    offerCollision,
    ignoreOffer: context.role === 'impolite' && offerCollision,
  };
}

/**
 * Decide what an inbound description does to the endpoint, in one step.
 *
 * Only offers are subject to collision handling; answers, pranswers and
 * rollbacks go straight to {@link applyDescription}.
 */
export function resolveInbound(context: InboundContext, type: DescriptionType): InboundDecision {
  const evaluation: OfferEvaluation =
    type === 'offer' ? evaluateOffer(context) : { offerCollision: false, ignoreOffer: false };

  if (evaluation.ignoreOffer) {
    return { kind: 'ignore', ...evaluation };
  }

  const result = applyDescription(context.state, 'remote', type);
  if (!result.ok) {
    return { kind: 'reject', reason: result.reason, ...evaluation };
  }
  return { kind: 'apply', state: result.state, rolledBack: result.rolledBack, ...evaluation };
}
