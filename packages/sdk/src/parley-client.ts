import {
  type EndpointLogger,
  NegotiationEndpoint,
  NegotiationError,
  type NodeId,
  type Participant,
  type RelayMessage,
  type SessionLayer,
  type SignalingChannel,
  type SignalingMessage,
  assignRole,
  decodeSignal,
  generateNodeId,
  isRelayMessage,
} from 'parley-protocol';
import WebSocket from 'ws';

export interface ParleyClientOptions {
  signalingUrl: string;
  /** Defaults to a random id */
  nodeId?: NodeId;
  /** Builds the media/connectivity engine for a new peer */
  createSession: (peerId: NodeId) => SessionLayer;
  /** Defaults to `console` */
  logger?: EndpointLogger;
}

export type ParticipantHandler = (participants: Participant[]) => void;
export type StatusHandler = (status: string, detail?: string) => void;
export type NegotiationErrorHandler = (peerId: NodeId, error: NegotiationError) => void;

/** Signaling channel to one peer, multiplexed over the relay socket. */
class RelayedChannel implements SignalingChannel {
  onMessage: ((message: SignalingMessage) => void) | null = null;
  private closed = false;

  constructor(
    private readonly peerId: NodeId,
    private readonly transmit: (relayed: RelayMessage) => void,
    private readonly localNodeId: NodeId,
  ) {}

  send(message: SignalingMessage): void {
    if (this.closed) {
      throw new Error(`Channel to ${this.peerId} is closed`);
    }
    this.transmit({ type: 'signal', from: this.localNodeId, to: this.peerId, payload: message });
  }

  deliver(message: SignalingMessage): void {
    if (!this.closed) this.onMessage?.(message);
  }

  close(): void {
    this.closed = true;
    this.onMessage = null;
  }
}

interface PeerLink {
  endpoint: NegotiationEndpoint;
  channel: RelayedChannel;
}

export class ParleyClient {
  private readonly nodeId: NodeId;
  private readonly signalingUrl: string;
  private readonly createSession: (peerId: NodeId) => SessionLayer;
  private readonly logger: EndpointLogger;
  private ws: WebSocket | null = null;
  private peers = new Map<NodeId, PeerLink>();

  private participantHandlers: ParticipantHandler[] = [];
  private statusHandlers: StatusHandler[] = [];
  private errorHandlers: NegotiationErrorHandler[] = [];

  constructor(options: ParleyClientOptions) {
    this.nodeId = options.nodeId ?? generateNodeId();
    this.signalingUrl = options.signalingUrl;
    this.createSession = options.createSession;
    this.logger = options.logger ?? console;
  }

  async connect(): Promise<void> {
    const ws = new WebSocket(this.signalingUrl);
    this.ws = ws;

    await new Promise<void>((resolve, reject) => {
      ws.once('open', () => resolve());
      ws.once('error', (err) =>
        reject(new NegotiationError('SIGNALING_FAILED', 'Failed to connect to signaling server', undefined, err)),
      );
    });

    ws.on('message', (data: WebSocket.RawData) => this.handleRelayMessage(data.toString()));
    ws.on('close', () => {
      this.emitStatus('signaling:disconnected');
    });
    ws.on('error', (err: Error) => {
      this.logger.warn(`[ParleyClient] signaling socket error: ${err.message}`);
    });

    this.transmit({ type: 'register', nodeId: this.nodeId });
    this.emitStatus('connected', this.nodeId);
  }

  /**
   * Open the negotiation with `peerId` and send the first offer. A peer that
   * already has an endpoint (ours, or one created by its own offer) gets it
   * back unchanged. Roles come from the two node ids, so both sides agree
   * without a round trip.
   */
  async connectToPeer(peerId: NodeId): Promise<NegotiationEndpoint> {
    const existing = this.peers.get(peerId);
    if (existing) return existing.endpoint;

    const { endpoint } = this.createPeer(peerId);
    await endpoint.produceAndSendOffer();
    return endpoint;
  }

  async restartIce(peerId: NodeId): Promise<boolean> {
    const link = this.peers.get(peerId);
    if (!link) {
      throw new NegotiationError('SIGNALING_FAILED', `No negotiation with peer ${peerId}`, { peerId });
    }
    return link.endpoint.restartIce();
  }

  getEndpoint(peerId: NodeId): NegotiationEndpoint | undefined {
    return this.peers.get(peerId)?.endpoint;
  }

  getConnectedPeers(): NodeId[] {
    return Array.from(this.peers.keys());
  }

  getNodeId(): NodeId {
    return this.nodeId;
  }

  disconnectPeer(peerId: NodeId): void {
    const link = this.peers.get(peerId);
    if (!link) return;
    link.endpoint.close();
    this.peers.delete(peerId);
    this.emitStatus('peer:disconnected', peerId);
  }

  disconnect(): void {
    for (const peerId of Array.from(this.peers.keys())) {
      this.disconnectPeer(peerId);
    }
    this.ws?.close();
    this.ws = null;
  }

  onParticipants(handler: ParticipantHandler): void {
    this.participantHandlers.push(handler);
  }

  onStatus(handler: StatusHandler): void {
    this.statusHandlers.push(handler);
  }

  onNegotiationError(handler: NegotiationErrorHandler): void {
    this.errorHandlers.push(handler);
  }

  private createPeer(peerId: NodeId): PeerLink {
    const role = assignRole(this.nodeId, peerId);
    const channel = new RelayedChannel(peerId, (relayed) => this.transmit(relayed), this.nodeId);
    const endpoint = new NegotiationEndpoint({
      role,
      session: this.createSession(peerId),
      signaling: channel,
      logger: this.logger,
      label: `${role}->${peerId.slice(0, 8)}`,
      events: {
        onStateChange: (_from, to) => this.emitStatus('negotiation:state', `${peerId}: ${to}`),
        onError: (error) => {
          for (const handler of this.errorHandlers) handler(peerId, error);
        },
      },
    });

    const link = { endpoint, channel };
    this.peers.set(peerId, link);
    this.emitStatus('peer:created', `${peerId} as ${role}`);
    return link;
  }

  private handleRelayMessage(raw: string): void {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      this.logger.warn('[ParleyClient] dropped non-JSON relay message');
      return;
    }
    if (!isRelayMessage(parsed)) {
      this.logger.warn('[ParleyClient] dropped malformed relay message');
      return;
    }

    switch (parsed.type) {
      case 'participants':
        for (const handler of this.participantHandlers) handler(parsed.participants ?? []);
        break;

      case 'presence':
        if (parsed.action === 'leave' && parsed.nodeId) {
          this.disconnectPeer(parsed.nodeId);
        }
        break;

      case 'signal':
        this.handleSignal(parsed);
        break;

      case 'error':
        this.emitStatus('error', parsed.error);
        break;

      case 'register':
        break;
    }
  }

  private handleSignal(relayed: RelayMessage): void {
    const peerId = relayed.from;
    if (!peerId || peerId === this.nodeId) return;

    let message: SignalingMessage;
    try {
      message = decodeSignal(relayed.payload);
    } catch (err) {
      const error = err instanceof NegotiationError ? err : new NegotiationError('INVALID_MESSAGE', String(err));
      for (const handler of this.errorHandlers) handler(peerId, error);
      return;
    }
    const link = this.peers.get(peerId) ?? this.createPeer(peerId);
    link.channel.deliver(message);
  }

  private transmit(message: RelayMessage): void {
    const ws = this.ws;
    if (!ws || ws.readyState !== WebSocket.OPEN) {
      throw new Error('Signaling socket is not open');
    }
    ws.send(JSON.stringify(message));
  }

  private emitStatus(status: string, detail?: string): void {
    for (const handler of this.statusHandlers) handler(status, detail);
  }
}
