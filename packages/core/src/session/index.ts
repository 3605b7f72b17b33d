export type { OfferOptions, SessionLayer } from './session-layer.js';
export { MemorySessionLayer, extractUfrag } from './memory-session.js';
export type { MemorySessionOptions } from './memory-session.js';
export { RtcSessionLayer } from './rtc-session.js';
export type { RtcPeerConnectionLike, RtcDescriptionInit, RtcCandidateInit } from './rtc-session.js';
