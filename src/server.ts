import express from 'express';
import bodyParser from 'body-parser';
import cors from 'cors';
import http from 'http';
import WebSocket, { WebSocketServer } from 'ws';
import { formatAmount } from './amount';
import { Ledger } from './blockchain';
import { toBlockJson, toTransactionJson } from './codec';
import { loadConfig } from './config';
import { GossipLayer } from './gossip';
import { Miner } from './miner';
import { Logger } from './types';

export type AppDeps = {
  ledger: Ledger;
  gossip?: GossipLayer;
  logger?: Logger;
};

const REQUIRED_TX_FIELDS = ['sender', 'recipient', 'amount', 'signature'];

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

export function createApp({ ledger, logger = console }: AppDeps): express.Express {
  const app = express();
  app.use(cors());
  app.use(bodyParser.json({ limit: '1mb' }));

  app.post('/transactions/new', (req, res) => {
    const body: unknown = req.body;
    if (typeof body !== 'object' || body === null) return res.status(400).json({ error: 'Missing body' });
    const values: Record<string, unknown> = { ...body };
    if (!REQUIRED_TX_FIELDS.every(k => k in values)) return res.status(400).json({ error: 'Missing values' });

    const { sender, recipient, amount, signature } = values;
    const result = ledger.submitTransaction({ sender, recipient, amount, signature }, 'local');
    if (!result.ok) {
      return res.status(400).json({ error: result.error.code, message: result.error.message });
    }
    res.status(201).json({ message: 'Transaction accepted', transaction: toTransactionJson(result.value) });
  });

  app.post('/mine', async (req, res) => {
    const miner: unknown = req.body?.miner;
    if (typeof miner !== 'string' || miner.length === 0) return res.status(400).json({ error: 'Miner address required' });
    try {
      const block = await ledger.mine(miner);
      res.json({ message: 'Block mined successfully', miner, blockHash: block.hash, timestamp: block.timestamp });
    } catch (e) {
      logger.error('mining failed:', e);
      res.status(500).json({ error: errorMessage(e) });
    }
  });

  app.get('/balance/:address', (req, res) => {
    const address = req.params.address;
    res.json({ address, balance: formatAmount(ledger.balanceOf(address)) });
  });

  app.get('/chain', (req, res) => {
    const chain = ledger.dumpChain();
    res.json({ length: chain.length, chain });
  });

  app.get('/pending', (req, res) => {
    const transactions = ledger.pendingTransactions().map(toTransactionJson);
    res.json({ length: transactions.length, transactions });
  });

  app.get('/health', (req, res) => res.json({ ok: true, height: ledger.height }));

  return app;
}

/**
 * Push ledger activity to browser clients connected on the HTTP port.
 * Returns a function that detaches the listeners.
 */
export function attachClientUpdates(wss: WebSocketServer, { ledger, gossip }: AppDeps): () => void {
  const broadcast = (payload: unknown) => {
    const msg = JSON.stringify({ type: 'update', payload });
    wss.clients.forEach(c => {
      if (c.readyState === WebSocket.OPEN) c.send(msg);
    });
  };
  const offLedger = ledger.subscribe(event => {
    if (event.type === 'transaction') broadcast({ type: 'transaction', origin: event.origin, tx: toTransactionJson(event.tx) });
    else broadcast({ type: 'block', origin: event.origin, block: toBlockJson(event.block) });
  });
  const offPeer = gossip?.onPeerBlock(announcement => broadcast({ type: 'peer_block', data: announcement }));
  return () => {
    offLedger();
    offPeer?.();
  };
}

async function start() {
  const config = loadConfig();
  const ledger = new Ledger({
    difficulty: config.difficulty,
    miningReward: config.miningReward,
    pendingPolicy: config.pendingPolicy,
    miner: new Miner({ maxAttempts: config.maxMiningAttempts }),
  });
  const gossip = new GossipLayer(ledger, {
    peers: config.peers,
    timeoutMs: config.gossipTimeoutMs,
    maxInFlight: config.gossipMaxInFlight,
  });
  gossip.attach();
  await gossip.listen(config.p2pPort);
  console.log('gossip listening on', config.p2pPort, 'peers:', config.peers.length ? config.peers.join(', ') : 'none');

  const app = createApp({ ledger, gossip });
  const server = http.createServer(app);
  const wss = new WebSocketServer({ server });
  wss.on('connection', () => {
    console.log('ws client connected');
  });
  attachClientUpdates(wss, { ledger, gossip });

  server.listen(config.port, () => {
    console.log('ledger node listening on', config.port);
  });
}

if (require.main === module) {
  start().catch(e => {
    console.error(e);
    process.exit(1);
  });
}
