import type { SignalingMessage } from '../types/index.js';

/**
 * Ordered, reliable delivery of signaling messages between two endpoints.
 * Reordering is not tolerated by the negotiation protocol.
 */
export interface SignalingChannel {
  send(message: SignalingMessage): void;
  onMessage: ((message: SignalingMessage) => void) | null;
  close(): void;
}

class MemorySignalingChannel implements SignalingChannel {
  onMessage: ((message: SignalingMessage) => void) | null = null;
  peer: MemorySignalingChannel | null = null;
  private closed = false;
  private queue: Promise<void> = Promise.resolve();

  send(message: SignalingMessage): void {
    if (this.closed) {
      throw new Error('Signaling channel is closed');
    }
    const target = this.peer;
    if (!target) return;
    // Deliver asynchronously, in send order, on a detached copy
    const copy = structuredClone(message);
    this.queue = this.queue.then(() => target.deliver(copy));
  }

  close(): void {
    this.closed = true;
    this.onMessage = null;
    if (this.peer) {
      this.peer.peer = null;
      this.peer = null;
    }
  }

  private deliver(message: SignalingMessage): void {
    if (this.closed) return;
    this.onMessage?.(message);
  }
}

/** Two linked in-process channels; what one sends, the other receives. */
export function createMemoryChannelPair(): [SignalingChannel, SignalingChannel] {
  const a = new MemorySignalingChannel();
  const b = new MemorySignalingChannel();
  a.peer = b;
  b.peer = a;
  return [a, b];
}
