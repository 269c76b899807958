import http from 'http';
import WebSocket, { WebSocketServer } from 'ws';
import { afterEach, describe, expect, it } from 'vitest';
import { attachClientUpdates, createApp } from '../server';
import { generateKeyPair } from '../utils/crypto';
import { signTransaction } from '../wallet';
import { flipLastHex, newLedger, silentLogger } from './helpers';

const servers: http.Server[] = [];

async function serve(server: http.Server): Promise<string> {
  servers.push(server);
  await new Promise<void>(resolve => server.listen(0, '127.0.0.1', () => resolve()));
  const addr = server.address();
  if (addr === null || typeof addr === 'string') throw new Error('server has no port');
  return `127.0.0.1:${addr.port}`;
}

function post(base: string, path: string, body: unknown): Promise<Response> {
  return fetch(`http://${base}${path}`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  });
}

afterEach(async () => {
  await Promise.all(servers.splice(0).map(s => new Promise<void>(resolve => {
    s.closeAllConnections();
    s.close(() => resolve());
  })));
});

describe('HTTP adapter', () => {
  it('runs a transfer end to end', async () => {
    const ledger = newLedger();
    const base = await serve(http.createServer(createApp({ ledger, logger: silentLogger() })));
    const alice = generateKeyPair();
    const bob = generateKeyPair();

    const mined = await post(base, '/mine', { miner: alice.publicKey });
    expect(mined.status).toBe(200);
    const minedBody = await mined.json();
    expect(minedBody.message).toBe('Block mined successfully');
    expect(minedBody.blockHash).toBe(ledger.latestBlock().hash);
    expect(minedBody.timestamp).toBe(ledger.latestBlock().timestamp);

    const tx = await signTransaction(alice.privateKey, bob.publicKey, '5.00000000');
    const accepted = await post(base, '/transactions/new', tx);
    expect(accepted.status).toBe(201);
    expect((await accepted.json()).message).toBe('Transaction accepted');

    const pending = await (await fetch(`http://${base}/pending`)).json();
    expect(pending).toEqual({ length: 1, transactions: [tx] });

    await post(base, '/mine', { miner: 'M' });
    const balance = await (await fetch(`http://${base}/balance/${bob.publicKey}`)).json();
    expect(balance).toEqual({ address: bob.publicKey, balance: '5.00000000' });
    expect((await (await fetch(`http://${base}/balance/M`)).json()).balance).toBe('10.00000000');

    const chain = await (await fetch(`http://${base}/chain`)).json();
    expect(chain.length).toBe(3);
    expect(chain.chain[0].previousHash).toBe('0');
    expect(chain.chain[2].previousHash).toBe(chain.chain[1].hash);
    expect(chain.chain[2].transactions).toEqual([tx, { sender: 'system', recipient: 'M', amount: '10.00000000', signature: null }]);
  });

  it('answers 400 with the rejection code', async () => {
    const ledger = newLedger();
    const base = await serve(http.createServer(createApp({ ledger, logger: silentLogger() })));
    const alice = generateKeyPair();
    await ledger.mine(alice.publicKey);
    const tx = await signTransaction(alice.privateKey, 'bob', '5');

    const missing = await post(base, '/transactions/new', { sender: tx.sender, recipient: 'bob', amount: '5' });
    expect(missing.status).toBe(400);
    expect(await missing.json()).toEqual({ error: 'Missing values' });

    const corrupted = await post(base, '/transactions/new', { ...tx, signature: flipLastHex(tx.signature ?? '') });
    expect(corrupted.status).toBe(400);
    expect((await corrupted.json()).error).toBe('InvalidSignature');

    const minted = await post(base, '/transactions/new', { sender: 'system', recipient: 'me', amount: '1', signature: '' });
    expect((await minted.json()).error).toBe('ReservedSender');

    const noMiner = await post(base, '/mine', {});
    expect(noMiner.status).toBe(400);
    expect(ledger.pendingTransactions()).toEqual([]);
  });

  it('reports health', async () => {
    const base = await serve(http.createServer(createApp({ ledger: newLedger(), logger: silentLogger() })));
    expect(await (await fetch(`http://${base}/health`)).json()).toEqual({ ok: true, height: 1 });
  });

  it('pushes ledger updates to websocket clients', async () => {
    const ledger = newLedger();
    const server = http.createServer(createApp({ ledger, logger: silentLogger() }));
    const wss = new WebSocketServer({ server });
    const detach = attachClientUpdates(wss, { ledger });
    const base = await serve(server);

    const client = new WebSocket(`ws://${base}`);
    await new Promise<void>((resolve, reject) => {
      client.once('open', () => resolve());
      client.once('error', reject);
    });
    const received = new Promise<unknown>(resolve => client.once('message', data => resolve(JSON.parse(data.toString()))));
    const block = await ledger.mine('M');

    const update = await received;
    expect(update).toMatchObject({ type: 'update', payload: { type: 'block', origin: 'local', block: { hash: block.hash } } });
    detach();
    client.close();
    for (const c of wss.clients) c.terminate();
    wss.close();
  });
});
