export const PARLEY_PROTOCOL_VERSION = '0.1.0';

export type {
  Role,
  SignalingState,
  DescriptionType,
  SessionDescription,
  ConnectivityCandidate,
  DescriptionMessage,
  CandidateMessage,
  SignalingMessage,
  Participant,
  RelayMessage,
  RelayMessageType,
} from './types/index.js';
export {
  DESCRIPTION_TYPES,
  isDescriptionType,
  isSessionDescription,
  isConnectivityCandidate,
  isSignalingMessage,
  isDescriptionMessage,
  isRelayMessage,
  isRelayMessageType,
} from './types/index.js';

export { NegotiationError, isNegotiationError } from './errors/index.js';
export type { NegotiationErrorCode } from './errors/index.js';

export { generateNodeId, randomHex, bytesToHex, NODE_ID_BYTES } from './identity/index.js';
export type { NodeId } from './identity/index.js';

export { assignRole, assignRoleByNonce, assignRoles, createRoleNonce } from './roles/index.js';

export { NegotiationEndpoint, SerialQueue, applyDescription, evaluateOffer, resolveInbound } from './negotiation/index.js';
export type {
  EndpointEvents,
  EndpointLogger,
  NegotiationEndpointOptions,
  DescriptionSide,
  InboundContext,
  InboundDecision,
  OfferEvaluation,
  TransitionResult,
} from './negotiation/index.js';

export { MemorySessionLayer, RtcSessionLayer, extractUfrag } from './session/index.js';
export type {
  OfferOptions,
  SessionLayer,
  MemorySessionOptions,
  RtcPeerConnectionLike,
  RtcDescriptionInit,
  RtcCandidateInit,
} from './session/index.js';

export { createMemoryChannelPair, encodeSignal, decodeSignal } from './transport/index.js';
export type { SignalingChannel } from './transport/index.js';
