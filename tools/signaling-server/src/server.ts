import { type Participant, type RelayMessage, isRelayMessage, isRelayMessageType } from 'parley-protocol';
import { WebSocketServer } from 'ws';
import type WebSocket from 'ws';
import type { SignalingServerConfig } from './config.js';

interface ConnectedNode {
  ws: WebSocket;
  nodeId: string;
}

export interface SignalingServerOptions {
  /** Host to bind (default: all interfaces) */
  host?: string;
  /** Logger for connection events (default: console) */
  logger?: Pick<Console, 'info' | 'warn'>;
}

export interface SignalingServer {
  wss: WebSocketServer;
  /** Resolves once the port is bound */
  listening: Promise<void>;
  /** Drops every connection; resolves once the port is released */
  close: () => Promise<void>;
}

function send(ws: WebSocket, message: RelayMessage): void {
  if (ws.readyState === ws.OPEN) {
    ws.send(JSON.stringify(message));
  }
}

export function createSignalingServer(port: number, options: SignalingServerOptions = {}): SignalingServer {
  const logger = options.logger ?? console;
  const wss = new WebSocketServer({ port, host: options.host });
  const nodes = new Map<string, ConnectedNode>();

  const listening = new Promise<void>((resolve, reject) => {
    wss.once('listening', () => resolve());
    wss.once('error', reject);
  });

  function broadcast(message: RelayMessage, except?: string): void {
    for (const node of nodes.values()) {
      if (node.nodeId !== except) send(node.ws, message);
    }
  }

  function broadcastParticipants(): void {
    const participants: Participant[] = Array.from(nodes.keys()).map((nodeId) => ({ nodeId }));
    broadcast({ type: 'participants', participants });
  }

  wss.on('connection', (ws: WebSocket) => {
    let registeredNodeId: string | null = null;

    ws.on('message', (raw: WebSocket.RawData) => {
      let parsed: unknown;
      try {
        parsed = JSON.parse(raw.toString());
      } catch {
        send(ws, { type: 'error', error: 'invalid JSON' });
        return;
      }
      if (!isRelayMessage(parsed)) {
        const known = typeof parsed === 'object' && parsed !== null && 'type' in parsed && isRelayMessageType(parsed.type);
        send(ws, { type: 'error', error: known ? 'malformed message' : 'unknown message type' });
        return;
      }
      const msg = parsed;

      if (msg.type === 'register') {
        if (!msg.nodeId) {
          send(ws, { type: 'error', error: 'missing nodeId' });
          return;
        }
        const existing = nodes.get(msg.nodeId);
        if (existing && existing.ws !== ws) {
          send(ws, { type: 'error', error: 'nodeId already registered' });
          return;
        }
        registeredNodeId = msg.nodeId;
        nodes.set(msg.nodeId, { ws, nodeId: msg.nodeId });
        logger.info(`[SignalingServer] registered ${msg.nodeId}`);
        broadcast({ type: 'presence', action: 'join', nodeId: msg.nodeId }, msg.nodeId);
        broadcastParticipants();
        return;
      }

      if (msg.type === 'signal') {
        if (!registeredNodeId) {
          send(ws, { type: 'error', error: 'not registered' });
          return;
        }
        if (!msg.to || !msg.from) {
          send(ws, { type: 'error', error: 'missing to or from' });
          return;
        }
        if (msg.from !== registeredNodeId) {
          logger.warn(`[SignalingServer] ${registeredNodeId} sent a signal as ${msg.from}`);
          send(ws, { type: 'error', error: 'from does not match registered nodeId' });
          return;
        }
        const target = nodes.get(msg.to);
        if (!target || target.ws.readyState !== target.ws.OPEN) {
          send(ws, { type: 'error', error: 'peer not found', to: msg.to });
          return;
        }
        // Forwarded verbatim
        target.ws.send(JSON.stringify(msg));
        return;
      }

      send(ws, { type: 'error', error: `unexpected ${msg.type} from client` });
    });

    ws.on('close', () => {
      if (registeredNodeId && nodes.get(registeredNodeId)?.ws === ws) {
        nodes.delete(registeredNodeId);
        logger.info(`[SignalingServer] left ${registeredNodeId}`);
        broadcast({ type: 'presence', action: 'leave', nodeId: registeredNodeId });
        broadcastParticipants();
      }
    });

    ws.on('error', (err: Error) => {
      logger.warn(`[SignalingServer] socket error: ${err.message}`);
    });
  });

  return {
    wss,
    listening,
    close: () =>
      new Promise<void>((resolve) => {
        nodes.clear();
        for (const client of wss.clients) {
          client.terminate();
        }
        wss.close(() => resolve());
      }),
  };
}

/**
 * Start the relay and wait until it is bound. A failed bind rejects after the
 * server has been shut down.
 */
export async function startSignalingServer(
  config: SignalingServerConfig,
  options: Omit<SignalingServerOptions, 'host'> = {},
): Promise<SignalingServer> {
  const logger = options.logger ?? console;
  const server = createSignalingServer(config.port, { ...options, host: config.host });
  try {
    await server.listening;
  } catch (err) {
    await server.close();
    throw err;
  }
  logger.info(`[SignalingServer] listening on ws://${config.host ?? 'localhost'}:${config.port}`);
  return server;
}
