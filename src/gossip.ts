import WebSocket, { WebSocketServer } from 'ws';
import { v4 as uuidv4 } from 'uuid';
import { formatAmount, parseAmount } from './amount';
import { Ledger } from './blockchain';
import { fromBlockJson, toBlockJson, toTransactionJson } from './codec';
import { MalformedPeerMessageError, PeerUnreachableError } from './errors';
import { BlockAnnouncement, GossipMessage, LedgerEvent, Logger, TransactionRequest } from './types';

export interface PeerTransport {
  deliver(peer: string, payload: string, timeoutMs: number): Promise<void>;
}

/** One short-lived connection per delivery: connect, send one frame, close. */
export class WebSocketTransport implements PeerTransport {
  deliver(peer: string, payload: string, timeoutMs: number): Promise<void> {
    return new Promise((resolve, reject) => {
      const ws = new WebSocket(peer);
      const timer = setTimeout(() => {
        ws.terminate();
        reject(new PeerUnreachableError(peer, `timed out after ${timeoutMs}ms`));
      }, timeoutMs);
      ws.on('open', () => {
        ws.send(payload, err => {
          clearTimeout(timer);
          ws.close();
          if (err) reject(new PeerUnreachableError(peer, err.message));
          else resolve();
        });
      });
      ws.on('error', err => {
        clearTimeout(timer);
        reject(new PeerUnreachableError(peer, err.message));
      });
    });
  }
}

export type GossipOptions = {
  peers: string[];
  transport?: PeerTransport;
  timeoutMs?: number;
  maxInFlight?: number; // per peer
  logger?: Logger;
};

type PeerBlockListener = (announcement: BlockAnnouncement) => void;

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

/** Envelope check only; payload contents are checked by whoever consumes them. */
export function decodeMessage(raw: string): GossipMessage {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (e) {
    throw new MalformedPeerMessageError('frame is not JSON');
  }
  if (!isRecord(parsed)) throw new MalformedPeerMessageError('frame is not an object');
  const { type, data } = parsed;
  if (!isRecord(data)) throw new MalformedPeerMessageError('missing data object');
  if (type === 'new_tx') {
    const { sender, recipient, amount, signature } = data;
    if (typeof sender !== 'string' || typeof recipient !== 'string') {
      throw new MalformedPeerMessageError('new_tx needs sender and recipient');
    }
    if (typeof amount !== 'string' && typeof amount !== 'number') {
      throw new MalformedPeerMessageError('new_tx needs an amount');
    }
    if (signature !== null && signature !== undefined && typeof signature !== 'string') {
      throw new MalformedPeerMessageError('new_tx signature must be a string');
    }
    // numbers like 1e-8 would otherwise reach the validator in exponent notation
    const units = parseAmount(amount);
    const text = units === null ? String(amount) : formatAmount(units);
    return { type: 'new_tx', data: { sender, recipient, amount: text, signature: signature ?? null } };
  }
  if (type === 'new_block') {
    const block = fromBlockJson(data);
    if (block) return { type: 'new_block', data: toBlockJson(block) };
    const { timestamp, hash } = data;
    if (typeof timestamp !== 'number' || typeof hash !== 'string') {
      throw new MalformedPeerMessageError('new_block needs timestamp and hash');
    }
    return { type: 'new_block', data: { timestamp, hash } };
  }
  throw new MalformedPeerMessageError(`unknown message type ${String(type)}`);
}

/**
 * Best-effort fan-out of local ledger events to a fixed peer list, and the
 * inbound side that feeds peer frames back into the ledger.
 */
export class GossipLayer {
  private peers: string[];
  private transport: PeerTransport;
  private timeoutMs: number;
  private maxInFlight: number;
  private logger: Logger;
  private inFlight = new Map<string, number>();
  private deliveries = new Set<Promise<void>>();
  private peerBlockListeners = new Set<PeerBlockListener>();
  private unsubscribe?: () => void;
  private server?: WebSocketServer;

  constructor(private readonly ledger: Ledger, opts: GossipOptions) {
    this.peers = [...opts.peers];
    this.transport = opts.transport ?? new WebSocketTransport();
    this.timeoutMs = opts.timeoutMs ?? 5000;
    this.maxInFlight = opts.maxInFlight ?? 32;
    this.logger = opts.logger ?? console;
  }

  /** Start broadcasting locally originated transactions and blocks. */
  attach() {
    if (this.unsubscribe) return;
    this.unsubscribe = this.ledger.subscribe(event => this.onLedgerEvent(event));
  }

  onPeerBlock(listener: PeerBlockListener): () => void {
    this.peerBlockListeners.add(listener);
    return () => {
      this.peerBlockListeners.delete(listener);
    };
  }

  private onLedgerEvent(event: LedgerEvent) {
    // peer-originated events are not re-gossiped
    if (event.origin !== 'local') return;
    if (event.type === 'transaction') this.broadcast({ type: 'new_tx', data: toTransactionJson(event.tx) });
    else this.broadcast({ type: 'new_block', data: toBlockJson(event.block) });
  }

  broadcast(message: GossipMessage) {
    const payload = JSON.stringify(message);
    const eventId = uuidv4();
    for (const peer of this.peers) {
      const busy = this.inFlight.get(peer) ?? 0;
      if (busy >= this.maxInFlight) {
        this.logger.warn(`gossip ${eventId}: outbox for ${peer} full, dropping ${message.type}`);
        continue;
      }
      this.inFlight.set(peer, busy + 1);
      const delivery: Promise<void> = this.transport.deliver(peer, payload, this.timeoutMs)
        .catch(e => {
          this.logger.warn(`gossip ${eventId}: ${message.type} to ${peer} failed:`, e instanceof Error ? e.message : e);
        })
        .finally(() => {
          this.inFlight.set(peer, (this.inFlight.get(peer) ?? 1) - 1);
          this.deliveries.delete(delivery);
        });
      this.deliveries.add(delivery);
    }
  }

  /** Resolves once every delivery started so far has settled. */
  async flush(): Promise<void> {
    while (this.deliveries.size > 0) {
      await Promise.all([...this.deliveries]);
    }
  }

  handleMessage(raw: string): Promise<void> {
    let message: GossipMessage;
    try {
      message = decodeMessage(raw);
    } catch (e) {
      this.logger.warn('dropping malformed peer message:', e instanceof Error ? e.message : e);
      return Promise.resolve();
    }

    if (message.type === 'new_tx') {
      const request: TransactionRequest = message.data;
      const res = this.ledger.submitTransaction(request, 'peer');
      if (!res.ok) this.logger.warn(`peer tx rejected (${res.error.code}): ${res.error.message}`);
      return Promise.resolve();
    }

    const announcement: BlockAnnouncement = { timestamp: message.data.timestamp, hash: message.data.hash };
    for (const listener of this.peerBlockListeners) {
      try {
        listener(announcement);
      } catch (e) {
        this.logger.error('peer block listener failed:', e);
      }
    }

    const block = fromBlockJson(message.data);
    if (!block) {
      this.logger.log(`peer announced block ${announcement.hash} (summary only, not applied)`);
      return Promise.resolve();
    }
    return this.ledger.acceptPeerBlock(block).then(outcome => {
      if (outcome.status !== 'accepted') this.logger.log(`peer block ${block.hash} ${outcome.status}: ${outcome.reason}`);
    }, e => {
      this.logger.error(`peer block ${block.hash} could not be applied:`, e);
    });
  }

  /** Accept peer frames on `port`. Resolves once the server is listening. */
  listen(port: number): Promise<WebSocketServer> {
    return new Promise((resolve, reject) => {
      const wss = new WebSocketServer({ port });
      wss.once('error', reject);
      wss.once('listening', () => {
        wss.off('error', reject);
        wss.on('error', e => this.logger.error('gossip server error:', e));
        resolve(wss);
      });
      wss.on('connection', ws => {
        ws.on('message', (data, isBinary) => {
          if (isBinary) {
            this.logger.warn('dropping binary peer frame');
            return;
          }
          void this.handleMessage(data.toString());
        });
        ws.on('error', e => this.logger.warn('peer connection error:', e.message));
      });
      this.server = wss;
    });
  }

  async close(): Promise<void> {
    this.unsubscribe?.();
    this.unsubscribe = undefined;
    await this.flush();
    const server = this.server;
    this.server = undefined;
    if (!server) return;
    for (const client of server.clients) client.terminate();
    await new Promise<void>((resolve, reject) => server.close(err => (err ? reject(err) : resolve())));
  }
}
