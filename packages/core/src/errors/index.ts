export { NegotiationError, isNegotiationError } from './negotiation-error.js';
export type { NegotiationErrorCode } from './negotiation-error.js';
