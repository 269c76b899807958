import { describe, expect, it } from 'vitest';
import { hashBlock } from '../codec';
import { MiningExhaustedError } from '../errors';
import { Miner, meetsDifficulty } from '../miner';
import { BlockFields } from '../types';

const candidate: BlockFields = {
  timestamp: 1_700_000_000_000,
  transactions: [{ sender: 'system', recipient: 'm', amount: 1_000_000_000n }],
  previousHash: 'ab'.repeat(32),
  nonce: 0,
};

// a candidate whose starting nonce does not already satisfy difficulty 1
function unsolvedCandidate(): BlockFields {
  let ts = candidate.timestamp;
  while (meetsDifficulty(hashBlock({ ...candidate, timestamp: ts }), 1)) ts++;
  return { ...candidate, timestamp: ts };
}

describe('meetsDifficulty', () => {
  it('counts leading zero hex digits', () => {
    expect(meetsDifficulty('000abc', 3)).toBe(true);
    expect(meetsDifficulty('00abc0', 3)).toBe(false);
    expect(meetsDifficulty('f00', 0)).toBe(true);
  });
});

describe('Miner', () => {
  it('finds a nonce whose hash has the required leading zeros', async () => {
    const block = await new Miner().mine(candidate, 2);
    expect(block.hash.startsWith('00')).toBe(true);
    expect(block.hash).toBe(hashBlock(block));
    expect(block.transactions).toEqual(candidate.transactions);
    expect(block.previousHash).toBe(candidate.previousHash);
  });

  it('is deterministic for the same candidate', async () => {
    const miner = new Miner();
    const a = await miner.mine(candidate, 2);
    const b = await miner.mine(candidate, 2);
    expect(b.nonce).toBe(a.nonce);
    expect(b.hash).toBe(a.hash);
  });

  it('leaves the candidate untouched and seals a frozen block', async () => {
    const fields = unsolvedCandidate();
    const block = await new Miner().mine(fields, 1);
    expect(fields.nonce).toBe(0);
    expect(block.nonce).toBeGreaterThan(0);
    expect(Object.isFrozen(block)).toBe(true);
  });

  it('returns the candidate as-is at difficulty 0', async () => {
    const block = await new Miner().mine(candidate, 0);
    expect(block.nonce).toBe(0);
    expect(block.hash).toBe(hashBlock(candidate));
  });

  it('yields to the event loop between batches', async () => {
    let ticked = false;
    setImmediate(() => {
      ticked = true;
    });
    await new Miner({ batchSize: 1 }).mine(unsolvedCandidate(), 1);
    expect(ticked).toBe(true);
  });

  it('gives up after maxAttempts', async () => {
    const miner = new Miner({ maxAttempts: 10 });
    await expect(miner.mine(candidate, 64)).rejects.toBeInstanceOf(MiningExhaustedError);
    await expect(miner.mine(candidate, 64)).rejects.toThrow('no nonce found after 10 attempts at difficulty 64');
  });

  it('rejects nonsensical difficulties', async () => {
    await expect(new Miner().mine(candidate, -1)).rejects.toBeInstanceOf(RangeError);
    await expect(new Miner().mine(candidate, 1.5)).rejects.toBeInstanceOf(RangeError);
    await expect(new Miner().mine(candidate, 65)).rejects.toBeInstanceOf(RangeError);
  });
});
