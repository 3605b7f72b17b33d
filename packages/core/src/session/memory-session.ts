import { randomHex } from '../identity/node-id.js';
import type { ConnectivityCandidate, SessionDescription } from '../types/index.js';
import type { OfferOptions, SessionLayer } from './session-layer.js';

export interface MemorySessionOptions {
  /** Address advertised in the host candidate (default: 127.0.0.1) */
  address?: string;
  /** Port advertised in the host candidate (default: 50000) */
  port?: number;
  /** Delay before local candidates are emitted (default: 0ms) */
  gatheringDelayMs?: number;
}

const CANDIDATE_PATTERN = /^candidate:\S+ \d+ (udp|tcp) \d+ \S+ \d+ typ \S+/;
const UFRAG_PATTERN = /^a=ice-ufrag:(\S+)/m;

export function extractUfrag(sdp: string): string | null {
  return UFRAG_PATTERN.exec(sdp)?.[1] ?? null;
}

/**
 * In-process stand-in for a WebRTC peer connection.
 *
 * Descriptions are minimal SDP documents carrying an `a=ice-ufrag` line that
 * identifies the connectivity generation; an ICE restart draws a new one.
 * Remote candidates are checked against the current remote ufrag, so a
 * candidate from a superseded exchange fails the way a browser would fail it.
 */
export class MemorySessionLayer implements SessionLayer {
  onCandidate: ((candidate: ConnectivityCandidate | null) => void) | null = null;
  onNegotiationNeeded: (() => void) | null = null;

  private readonly sessionId = Date.now();
  private readonly address: string;
  private readonly port: number;
  private readonly gatheringDelayMs: number;

  private version = 0;
  private ufrag: string | null = null;
  private local: SessionDescription | null = null;
  private remote: SessionDescription | null = null;
  private remoteUfrag: string | null = null;
  private answeredUfrag: string | null = null;
  private remoteCandidates: ConnectivityCandidate[] = [];
  private remoteGatheringComplete = false;
  private channels: string[] = [];
  private gatheringTimers = new Set<ReturnType<typeof setTimeout>>();
  private closed = false;

  constructor(options: MemorySessionOptions = {}) {
    this.address = options.address ?? '127.0.0.1';
    this.port = options.port ?? 50000;
    this.gatheringDelayMs = options.gatheringDelayMs ?? 0;
  }

  get localDescription(): SessionDescription | null {
    return this.local;
  }

  get remoteDescription(): SessionDescription | null {
    return this.remote;
  }

  get appliedCandidates(): readonly ConnectivityCandidate[] {
    return this.remoteCandidates;
  }

  get endOfCandidates(): boolean {
    return this.remoteGatheringComplete;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Simulates adding a data channel, which requires renegotiation. */
  addChannel(label: string): void {
    this.assertOpen();
    this.channels.push(label);
    this.onNegotiationNeeded?.();
  }

  async createOffer(options: OfferOptions = {}): Promise<SessionDescription> {
    this.assertOpen();
    if (this.ufrag === null || options.iceRestart) {
      this.ufrag = randomHex(4);
    }
    return { type: 'offer', sdp: this.buildSdp(this.ufrag) };
  }

  async createAnswer(): Promise<SessionDescription> {
    this.assertOpen();
    if (this.remote?.type !== 'offer') {
      throw new Error('No remote offer to answer');
    }
    // A restarted remote offer restarts our side too
    if (this.ufrag === null || this.remoteUfrag !== this.answeredUfrag) {
      this.ufrag = randomHex(4);
      this.answeredUfrag = this.remoteUfrag;
    }
    return { type: 'answer', sdp: this.buildSdp(this.ufrag) };
  }

  async setLocalDescription(description: SessionDescription): Promise<void> {
    this.assertOpen();
    if (description.type === 'rollback') {
      this.local = null;
      this.cancelGathering();
      return;
    }
    this.local = description;
    this.scheduleGathering(extractUfrag(description.sdp));
  }

  async setRemoteDescription(description: SessionDescription): Promise<void> {
    this.assertOpen();
    if (description.type === 'rollback') {
      this.remote = null;
      return;
    }
    const ufrag = extractUfrag(description.sdp);
    if (ufrag === null) {
      throw new Error('Malformed remote description: missing ice-ufrag');
    }
    if (description.type === 'offer' && this.local?.type === 'offer') {
      // Implicit rollback of our pending offer
      this.local = null;
    }
    if (ufrag !== this.remoteUfrag) {
      this.remoteCandidates = [];
      this.remoteGatheringComplete = false;
    }
    this.remote = description;
    this.remoteUfrag = ufrag;
  }

  async addCandidate(candidate: ConnectivityCandidate | null): Promise<void> {
    this.assertOpen();
    if (this.remote === null) {
      throw new Error('Cannot add a candidate before a remote description is set');
    }
    if (candidate === null) {
      this.remoteGatheringComplete = true;
      return;
    }
    if (!CANDIDATE_PATTERN.test(candidate.candidate)) {
      throw new Error(`Malformed candidate: ${candidate.candidate}`);
    }
    if (candidate.usernameFragment !== null && candidate.usernameFragment !== this.remoteUfrag) {
      throw new Error(`Stale candidate for ufrag ${candidate.usernameFragment}`);
    }
    this.remoteCandidates.push(candidate);
  }

  close(): void {
    this.closed = true;
    this.cancelGathering();
    this.onCandidate = null;
    this.onNegotiationNeeded = null;
  }

  private cancelGathering(): void {
    for (const timer of this.gatheringTimers) clearTimeout(timer);
    this.gatheringTimers.clear();
  }

  private scheduleGathering(ufrag: string | null): void {
    const timer = setTimeout(() => {
      this.gatheringTimers.delete(timer);
      if (this.closed) return;
      this.onCandidate?.({
        candidate: `candidate:1 1 udp 2122260223 ${this.address} ${this.port} typ host`,
        sdpMid: '0',
        sdpMLineIndex: 0,
        usernameFragment: ufrag,
      });
      this.onCandidate?.(null);
    }, this.gatheringDelayMs);
    this.gatheringTimers.add(timer);
  }

  private buildSdp(ufrag: string): string {
    this.version++;
    const lines = [
      'v=0',
      `o=- ${this.sessionId} ${this.version} IN IP4 ${this.address}`,
      's=-',
      't=0 0',
      'm=application 9 UDP/DTLS/SCTP webrtc-datachannel',
      'a=mid:0',
      `a=ice-ufrag:${ufrag}`,
      ...this.channels.map((label) => `a=x-channel:${label}`),
    ];
    return `${lines.join('\r\n')}\r\n`;
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new Error('Session is closed');
    }
  }
}
