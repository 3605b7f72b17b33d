export { NegotiationEndpoint } from './endpoint.js';
export type { EndpointEvents, EndpointLogger, NegotiationEndpointOptions } from './endpoint.js';
export { applyDescription, evaluateOffer, resolveInbound } from './signaling-state.js';
export type {
  DescriptionSide,
  InboundContext,
  InboundDecision,
  OfferEvaluation,
  TransitionResult,
} from './signaling-state.js';
export { SerialQueue } from './serial-queue.js';
