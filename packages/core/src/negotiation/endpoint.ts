/**
 * NEGOTIATION ENDPOINT
 *
 * One side of a two-party offer/answer negotiation ("perfect negotiation").
 *
 * - The impolite endpoint never yields: a colliding inbound offer is dropped.
 * - The polite endpoint yields: a colliding inbound offer replaces its own
 *   pending offer in a single transition and is answered.
 *
 * Every operation that reads or writes the negotiation state runs on a
 * {@link SerialQueue}, so the state checked at the start of an operation is
 * still the state when it finishes.
 *
 * @module negotiation
 */

import { NegotiationError, type NegotiationErrorCode, isNegotiationError } from '../errors/index.js';
import type { SessionLayer } from '../session/session-layer.js';
import type { SignalingChannel } from '../transport/signaling-channel.js';
import type {
  ConnectivityCandidate,
  Role,
  SessionDescription,
  SignalingMessage,
  SignalingState,
} from '../types/index.js';
import { isSignalingMessage } from '../types/index.js';
import { SerialQueue } from './serial-queue.js';
import { applyDescription, resolveInbound } from './signaling-state.js';

export type EndpointLogger = Pick<Console, 'debug' | 'info' | 'warn'>;

export interface EndpointEvents {
  onStateChange: (from: SignalingState, to: SignalingState) => void;
  onOfferSent: (offer: SessionDescription) => void;
  onAnswerSent: (answer: SessionDescription) => void;
  /** An inbound offer was discarded because of a collision (impolite side only) */
  onOfferIgnored: (offer: SessionDescription) => void;
  /** Our pending offer was abandoned in favour of the remote one (polite side only) */
  onRollback: () => void;
  /** Failures of work nobody awaits: inbound messages, candidate forwarding, negotiation-needed */
  onError: (error: NegotiationError) => void;
}

export interface NegotiationEndpointOptions {
  role: Role;
  session: SessionLayer;
  signaling: SignalingChannel;
  events?: Partial<EndpointEvents>;
  /** Defaults to `console` */
  logger?: EndpointLogger;
  /** Shown in log lines (default: the role) */
  label?: string;
}

function wrapError(
  code: NegotiationErrorCode,
  message: string,
  err: unknown,
  context?: Record<string, unknown>,
): NegotiationError {
  if (isNegotiationError(err)) return err;
  const detail = err instanceof Error ? err.message : String(err);
  return new NegotiationError(code, `${message}: ${detail}`, context, err);
}

export class NegotiationEndpoint {
  readonly role: Role;

  private readonly session: SessionLayer;
  private readonly signaling: SignalingChannel;
  private readonly events: Partial<EndpointEvents>;
  private readonly logger: EndpointLogger;
  private readonly tag: string;
  private readonly queue = new SerialQueue();

  private state: SignalingState = 'stable';
  private offerInFlight = false;
  private offerIgnored = false;
  private iceRestartPending = false;
  private negotiationPending = false;

  constructor(options: NegotiationEndpointOptions) {
    this.role = options.role;
    this.session = options.session;
    this.signaling = options.signaling;
    this.events = options.events ?? {};
    this.logger = options.logger ?? console;
    this.tag = `[NegotiationEndpoint:${options.label ?? options.role}]`;

    this.signaling.onMessage = (message) => {
      void this.handleMessage(message).catch((err: unknown) => this.reportError(err));
    };
    this.session.onCandidate = (candidate) => this.forwardCandidate(candidate);
    this.session.onNegotiationNeeded = () => {
      void this.negotiationNeeded();
    };
  }

  get signalingState(): SignalingState {
    return this.state;
  }

  /** True only while a local offer is being generated and sent */
  get makingOffer(): boolean {
    return this.offerInFlight;
  }

  /** True when the most recent inbound offer was discarded */
  get ignoreOffer(): boolean {
    return this.offerIgnored;
  }

  get isClosed(): boolean {
    return this.state === 'closed';
  }

  /**
   * Generate an offer, set it locally and send it.
   *
   * Resolves `false` without doing anything when the endpoint is not
   * `stable`; the request is remembered and retried once it is.
   */
  produceAndSendOffer(): Promise<boolean> {
    return this.queue.run(async () => {
      this.assertOpen();
      if (this.state !== 'stable') {
        this.negotiationPending = true;
        this.logger.debug(`${this.tag} offer deferred, state is ${this.state}`);
        return false;
      }

      this.offerInFlight = true;
      try {
        const iceRestart = this.iceRestartPending;
        let offer: SessionDescription;
        try {
          offer = await this.session.createOffer({ iceRestart });
        } catch (err) {
          throw wrapError('GENERATION_FAILED', 'Failed to create offer', err, { iceRestart });
        }

        await this.applyLocal(offer);
        try {
          this.transmit({ description: offer });
        } catch (err) {
          await this.rollbackUnsentOffer();
          throw err;
        }
        this.iceRestartPending = false;
        this.logger.debug(`${this.tag} sent offer${iceRestart ? ' (ICE restart)' : ''}`);
        this.events.onOfferSent?.(offer);
        return true;
      } finally {
        this.offerInFlight = false;
      }
    });
  }

  /** Request a fresh connectivity handshake on the next offer and send it. */
  restartIce(): Promise<boolean> {
    this.iceRestartPending = true;
    return this.produceAndSendOffer();
  }

  /** Fire-and-forget negotiation; failures go to `onError`. */
  negotiationNeeded(): Promise<void> {
    return this.produceAndSendOffer().then(
      () => undefined,
      (err: unknown) => this.reportError(err),
    );
  }

  /** Process one inbound signaling message. */
  handleMessage(message: SignalingMessage): Promise<void> {
    return this.queue.run(async () => {
      this.assertOpen();
      if (!isSignalingMessage(message)) {
        throw new NegotiationError('INVALID_MESSAGE', 'Malformed signaling message', { received: message });
      }
      if (message.description !== undefined) {
        await this.handleDescription(message.description);
      } else {
        await this.handleCandidate(message.candidate);
      }
    });
  }

  /** Resolves once every operation submitted so far has settled. */
  whenIdle(): Promise<void> {
    return this.queue.idle();
  }

  close(): void {
    if (this.state === 'closed') return;
    this.setState('closed');
    this.signaling.onMessage = null;
    this.session.close();
    this.signaling.close();
    this.logger.debug(`${this.tag} closed`);
  }

  private async handleDescription(description: SessionDescription): Promise<void> {
    const decision = resolveInbound(
      { state: this.state, role: this.role, makingOffer: this.offerInFlight },
      description.type,
    );
    if (description.type === 'offer') {
      this.offerIgnored = decision.ignoreOffer;
    }

    if (decision.kind === 'ignore') {
      this.logger.info(`${this.tag} ignoring colliding offer in state ${this.state}`);
      this.events.onOfferIgnored?.(description);
      return;
    }
    if (decision.kind === 'reject') {
      throw new NegotiationError('INVALID_STATE', decision.reason, {
        state: this.state,
        type: description.type,
      });
    }

    try {
      await this.session.setRemoteDescription(description);
    } catch (err) {
      throw wrapError('DESCRIPTION_REJECTED', `Failed to apply remote ${description.type}`, err);
    }
    this.assertOpen();
    this.setState(decision.state);
    if (decision.rolledBack && description.type === 'offer') {
      this.logger.info(`${this.tag} rolled back local offer for colliding remote offer`);
      this.events.onRollback?.();
    }

    if (description.type === 'offer') {
      let answer: SessionDescription;
      try {
        answer = await this.session.createAnswer();
      } catch (err) {
        throw wrapError('GENERATION_FAILED', 'Failed to create answer', err);
      }
      await this.applyLocal(answer);
      this.transmit({ description: answer });
      this.logger.debug(`${this.tag} sent answer`);
      this.events.onAnswerSent?.(answer);
    }

    this.resumePendingNegotiation();
  }

  private async handleCandidate(candidate: ConnectivityCandidate | null): Promise<void> {
    try {
      await this.session.addCandidate(candidate);
    } catch (err) {
      if (this.offerIgnored) {
        this.logger.debug(`${this.tag} dropped candidate of an ignored offer`);
        return;
      }
      throw wrapError('CANDIDATE_REJECTED', 'Failed to add candidate', err, {
        candidate: candidate?.candidate ?? null,
      });
    }
  }

  private async applyLocal(description: SessionDescription): Promise<void> {
    this.assertOpen();
    const result = applyDescription(this.state, 'local', description.type);
    if (!result.ok) {
      throw new NegotiationError('INVALID_STATE', result.reason, { state: this.state, type: description.type });
    }
    try {
      await this.session.setLocalDescription(description);
    } catch (err) {
      throw wrapError('GENERATION_FAILED', `Failed to apply local ${description.type}`, err);
    }
    this.assertOpen();
    this.setState(result.state);
  }

  /** Drop a local offer the peer never received so the next attempt starts from `stable`. */
  private async rollbackUnsentOffer(): Promise<void> {
    const result = applyDescription(this.state, 'local', 'rollback');
    if (!result.ok) return;
    try {
      await this.session.setLocalDescription({ type: 'rollback', sdp: '' });
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      this.logger.warn(`${this.tag} could not roll back unsent offer: ${detail}`);
      return;
    }
    if (this.state === 'closed') return;
    this.setState(result.state);
    this.logger.debug(`${this.tag} rolled back unsent offer`);
  }

  private transmit(message: SignalingMessage): void {
    try {
      this.signaling.send(message);
    } catch (err) {
      throw wrapError('TRANSPORT_FAILED', 'Failed to send signaling message', err);
    }
  }

  private forwardCandidate(candidate: ConnectivityCandidate | null): void {
    if (this.state === 'closed') return;
    try {
      this.transmit({ candidate });
    } catch (err) {
      this.reportError(err);
    }
  }

  private resumePendingNegotiation(): void {
    if (this.state !== 'stable' || !this.negotiationPending) return;
    this.negotiationPending = false;
    void this.negotiationNeeded();
  }

  private setState(next: SignalingState): void {
    const previous = this.state;
    if (previous === next) return;
    this.state = next;
    this.events.onStateChange?.(previous, next);
  }

  private assertOpen(): void {
    if (this.state === 'closed') {
      throw new NegotiationError('ENDPOINT_CLOSED', 'Endpoint is closed');
    }
  }

  private reportError(err: unknown): void {
    const error = wrapError('SIGNALING_FAILED', 'Negotiation failed', err);
    this.logger.warn(`${this.tag} ${error.code}: ${error.message}`);
    this.events.onError?.(error);
  }
}
