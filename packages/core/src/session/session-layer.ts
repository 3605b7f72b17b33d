import type { ConnectivityCandidate, SessionDescription } from '../types/index.js';

export interface OfferOptions {
  /** Request fresh connectivity credentials (ICE restart). */
  iceRestart?: boolean;
}

/**
 * The media/connectivity engine an endpoint negotiates for.
 *
 * In a browser this is an `RTCPeerConnection` (see {@link RtcSessionLayer});
 * {@link MemorySessionLayer} simulates one in-process.
 */
export interface SessionLayer {
  createOffer(options?: OfferOptions): Promise<SessionDescription>;
  createAnswer(): Promise<SessionDescription>;
  setLocalDescription(description: SessionDescription): Promise<void>;
  setRemoteDescription(description: SessionDescription): Promise<void>;
  /** Fails if the candidate is malformed or stale, or no remote description is set. */
  addCandidate(candidate: ConnectivityCandidate | null): Promise<void>;
  close(): void;
  /** Locally discovered candidates; `null` once gathering completes. */
  onCandidate: ((candidate: ConnectivityCandidate | null) => void) | null;
  onNegotiationNeeded: (() => void) | null;
}
