import type { RelayMessage } from 'parley-protocol';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import WebSocket from 'ws';
import { createSignalingServer, startSignalingServer } from './server.js';

const PORT = 9123;

function connectClient(): Promise<WebSocket> {
  return new Promise((resolve, reject) => {
    const ws = new WebSocket(`ws://localhost:${PORT}`);
    ws.on('open', () => resolve(ws));
    ws.on('error', reject);
  });
}

function waitForMessage(ws: WebSocket): Promise<RelayMessage> {
  return new Promise((resolve) => {
    ws.once('message', (data) => {
      resolve(JSON.parse(data.toString()));
    });
  });
}

function waitForMessageOfType(ws: WebSocket, type: string): Promise<RelayMessage> {
  return new Promise((resolve) => {
    const handler = (data: WebSocket.RawData) => {
      const msg = JSON.parse(data.toString());
      if (msg.type === type) {
        ws.off('message', handler);
        resolve(msg);
      }
    };
    ws.on('message', handler);
  });
}

function send(ws: WebSocket, msg: RelayMessage): void {
  ws.send(JSON.stringify(msg));
}

async function register(ws: WebSocket, nodeId: string): Promise<void> {
  const participants = waitForMessageOfType(ws, 'participants');
  send(ws, { type: 'register', nodeId });
  await participants;
}

describe('signaling server', () => {
  let close: () => Promise<void>;
  const clients: WebSocket[] = [];

  beforeEach(async () => {
    const server = createSignalingServer(PORT, { logger: { info: vi.fn(), warn: vi.fn() } });
    close = server.close;
    await server.listening;
  });

  afterEach(async () => {
    for (const c of clients) {
      if (c.readyState === WebSocket.OPEN) c.close();
    }
    clients.length = 0;
    await close();
  });

  it('registers a node and broadcasts participant list', async () => {
    const ws = await connectClient();
    clients.push(ws);

    const participantsPromise = waitForMessageOfType(ws, 'participants');
    send(ws, { type: 'register', nodeId: 'aaa' });

    const msg = await participantsPromise;
    expect(msg.participants).toEqual([{ nodeId: 'aaa' }]);
  });

  it('broadcasts updated list when second node joins', async () => {
    const ws1 = await connectClient();
    const ws2 = await connectClient();
    clients.push(ws1, ws2);

    await register(ws1, 'aaa');

    const p1 = waitForMessageOfType(ws1, 'participants');
    const p2 = waitForMessageOfType(ws2, 'participants');
    send(ws2, { type: 'register', nodeId: 'bbb' });

    const [msg1, msg2] = await Promise.all([p1, p2]);
    expect(msg1.participants).toHaveLength(2);
    expect(msg2.participants).toEqual([{ nodeId: 'aaa' }, { nodeId: 'bbb' }]);
  });

  it('rejects a second registration of the same node id', async () => {
    const ws1 = await connectClient();
    const ws2 = await connectClient();
    clients.push(ws1, ws2);

    await register(ws1, 'aaa');
    const p = waitForMessageOfType(ws2, 'error');
    send(ws2, { type: 'register', nodeId: 'aaa' });

    const msg = await p;
    expect(msg.error).toBe('nodeId already registered');
  });

  it('broadcasts presence join and leave events', async () => {
    const ws1 = await connectClient();
    const ws2 = await connectClient();
    clients.push(ws1, ws2);

    await register(ws1, 'aaa');

    const presenceJoin = waitForMessageOfType(ws1, 'presence');
    send(ws2, { type: 'register', nodeId: 'bbb' });

    const joinMsg = await presenceJoin;
    expect(joinMsg.action).toBe('join');
    expect(joinMsg.nodeId).toBe('bbb');

    const presenceLeave = waitForMessageOfType(ws1, 'presence');
    ws2.close();

    const leaveMsg = await presenceLeave;
    expect(leaveMsg.action).toBe('leave');
    expect(leaveMsg.nodeId).toBe('bbb');
  });

  it('relays signal messages to target node', async () => {
    const ws1 = await connectClient();
    const ws2 = await connectClient();
    clients.push(ws1, ws2);

    await register(ws1, 'aaa');
    await register(ws2, 'bbb');

    const p = waitForMessageOfType(ws2, 'signal');
    const payload = { description: { type: 'offer', sdp: 'v=0' } };
    send(ws1, { type: 'signal', from: 'aaa', to: 'bbb', payload });

    const msg = await p;
    expect(msg).toEqual({ type: 'signal', from: 'aaa', to: 'bbb', payload });
  });

  it('returns error for signal to unknown peer', async () => {
    const ws1 = await connectClient();
    clients.push(ws1);

    await register(ws1, 'aaa');

    const p = waitForMessageOfType(ws1, 'error');
    send(ws1, { type: 'signal', from: 'aaa', to: 'unknown', payload: {} });

    const msg = await p;
    expect(msg).toEqual({ type: 'error', error: 'peer not found', to: 'unknown' });
  });

  it('returns error for signal without addressing', async () => {
    const ws1 = await connectClient();
    clients.push(ws1);
    await register(ws1, 'aaa');

    const p = waitForMessageOfType(ws1, 'error');
    send(ws1, { type: 'signal', payload: {} });

    const msg = await p;
    expect(msg.error).toBe('missing to or from');
  });

  it('refuses signals from a socket that has not registered', async () => {
    const ws1 = await connectClient();
    const ws2 = await connectClient();
    clients.push(ws1, ws2);
    await register(ws2, 'bbb');

    const onSignal = vi.fn();
    ws2.on('message', (data: WebSocket.RawData) => {
      const msg = JSON.parse(data.toString());
      if (msg.type === 'signal') onSignal(msg);
    });
    const p = waitForMessage(ws1);
    send(ws1, { type: 'signal', from: 'aaa', to: 'bbb', payload: { candidate: null } });

    const msg = await p;
    expect(msg).toEqual({ type: 'error', error: 'not registered' });
    expect(onSignal).not.toHaveBeenCalled();
  });

  it('refuses signals sent under another node id', async () => {
    const aaa = await connectClient();
    const bbb = await connectClient();
    const mmm = await connectClient();
    clients.push(aaa, bbb, mmm);
    await register(aaa, 'aaa');
    await register(bbb, 'bbb');
    await register(mmm, 'mmm');

    const received: RelayMessage[] = [];
    bbb.on('message', (data: WebSocket.RawData) => {
      const msg = JSON.parse(data.toString());
      if (msg.type === 'signal') received.push(msg);
    });
    const error = waitForMessageOfType(mmm, 'error');
    const offer = { description: { type: 'offer', sdp: 'v=0' } };
    send(mmm, { type: 'signal', from: 'aaa', to: 'bbb', payload: offer });

    expect((await error).error).toBe('from does not match registered nodeId');

    // the genuine sender still gets through, and only its signal arrives
    const relayed = waitForMessageOfType(bbb, 'signal');
    send(aaa, { type: 'signal', from: 'aaa', to: 'bbb', payload: { candidate: null } });
    await relayed;
    expect(received).toEqual([{ type: 'signal', from: 'aaa', to: 'bbb', payload: { candidate: null } }]);
  });

  it('returns error for known types with mistyped fields', async () => {
    const ws = await connectClient();
    clients.push(ws);

    const p = waitForMessage(ws);
    ws.send(JSON.stringify({ type: 'register', nodeId: 42 }));

    const msg = await p;
    expect(msg).toEqual({ type: 'error', error: 'malformed message' });
  });

  it('returns error for invalid JSON', async () => {
    const ws = await connectClient();
    clients.push(ws);

    const p = waitForMessage(ws);
    ws.send('not json');

    const msg = await p;
    expect(msg.type).toBe('error');
    expect(msg.error).toBe('invalid JSON');
  });

  it('returns error for unknown message types', async () => {
    const ws = await connectClient();
    clients.push(ws);

    const p = waitForMessage(ws);
    ws.send(JSON.stringify({ type: 'heartbeat' }));

    const msg = await p;
    expect(msg.error).toBe('unknown message type');
  });

  it('returns error for server-only message types sent by a client', async () => {
    const ws = await connectClient();
    clients.push(ws);

    const p = waitForMessage(ws);
    send(ws, { type: 'participants', participants: [] });

    const msg = await p;
    expect(msg.error).toBe('unexpected participants from client');
  });
});

describe('startSignalingServer', () => {
  it('resolves once bound and announces the address', async () => {
    const logger = { info: vi.fn(), warn: vi.fn() };
    const server = await startSignalingServer({ port: PORT }, { logger });

    expect(logger.info).toHaveBeenCalledWith('[SignalingServer] listening on ws://localhost:9123');
    const ws = await connectClient();
    const participants = waitForMessageOfType(ws, 'participants');
    send(ws, { type: 'register', nodeId: 'aaa' });
    expect((await participants).participants).toEqual([{ nodeId: 'aaa' }]);

    ws.close();
    await server.close();
  });

  it('rejects when the port is already taken', async () => {
    const logger = { info: vi.fn(), warn: vi.fn() };
    const first = await startSignalingServer({ port: PORT }, { logger });

    await expect(startSignalingServer({ port: PORT }, { logger })).rejects.toMatchObject({ code: 'EADDRINUSE' });

    await first.close();
  });
});

