import type { ConnectivityCandidate, DescriptionType, SessionDescription } from '../types/index.js';
import { isDescriptionType } from '../types/index.js';
import type { OfferOptions, SessionLayer } from './session-layer.js';

export interface RtcDescriptionInit {
  type: string;
  sdp?: string;
}

export interface RtcCandidateInit {
  candidate: string;
  sdpMid: string | null;
  sdpMLineIndex: number | null;
  usernameFragment: string | null;
}

/**
 * The parts of `RTCPeerConnection` the adapter uses. Declared structurally
 * so the package compiles without DOM typings.
 */
export interface RtcPeerConnectionLike {
  createOffer(options?: { iceRestart?: boolean }): Promise<RtcDescriptionInit>;
  createAnswer(): Promise<RtcDescriptionInit>;
  setLocalDescription(description: { type: DescriptionType; sdp: string }): Promise<void>;
  setRemoteDescription(description: { type: DescriptionType; sdp: string }): Promise<void>;
  addIceCandidate(candidate?: RtcCandidateInit): Promise<void>;
  close(): void;
  onicecandidate: ((event: { candidate: RtcCandidateInit | null }) => void) | null;
  onnegotiationneeded: (() => void) | null;
}

function toDescription(init: RtcDescriptionInit, expected: 'offer' | 'answer'): SessionDescription {
  if (!isDescriptionType(init.type) || init.type !== expected) {
    throw new Error(`Expected an ${expected} but the connection produced ${init.type}`);
  }
  if (!init.sdp) {
    throw new Error(`Generated ${expected} has no SDP`);
  }
  return { type: init.type, sdp: init.sdp };
}

/** {@link SessionLayer} over a browser (or polyfilled) peer connection. */
export class RtcSessionLayer implements SessionLayer {
  onCandidate: ((candidate: ConnectivityCandidate | null) => void) | null = null;
  onNegotiationNeeded: (() => void) | null = null;

  readonly connection: RtcPeerConnectionLike;

  constructor(connection: RtcPeerConnectionLike) {
    this.connection = connection;

    this.connection.onicecandidate = ({ candidate }) => {
      this.onCandidate?.(
        candidate
          ? {
              candidate: candidate.candidate,
              sdpMid: candidate.sdpMid,
              sdpMLineIndex: candidate.sdpMLineIndex,
              usernameFragment: candidate.usernameFragment,
            }
          : null,
      );
    };

    this.connection.onnegotiationneeded = () => {
      this.onNegotiationNeeded?.();
    };
  }

  async createOffer(options: OfferOptions = {}): Promise<SessionDescription> {
    const init = await this.connection.createOffer(options.iceRestart ? { iceRestart: true } : undefined);
    return toDescription(init, 'offer');
  }

  async createAnswer(): Promise<SessionDescription> {
    return toDescription(await this.connection.createAnswer(), 'answer');
  }

  async setLocalDescription(description: SessionDescription): Promise<void> {
    await this.connection.setLocalDescription({ type: description.type, sdp: description.sdp });
  }

  async setRemoteDescription(description: SessionDescription): Promise<void> {
    await this.connection.setRemoteDescription({ type: description.type, sdp: description.sdp });
  }

  async addCandidate(candidate: ConnectivityCandidate | null): Promise<void> {
    // No argument means end-of-candidates
    if (candidate === null) {
      await this.connection.addIceCandidate();
      return;
    }
    await this.connection.addIceCandidate({ ...candidate });
  }

  close(): void {
    this.connection.onicecandidate = null;
    this.connection.onnegotiationneeded = null;
    this.onCandidate = null;
    this.onNegotiationNeeded = null;
    this.connection.close();
  }
}
