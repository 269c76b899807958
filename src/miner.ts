import { hashBlock, sealBlock } from './codec';
import { MiningExhaustedError } from './errors';
import { Block, BlockFields, Hex } from './types';

export const MAX_DIFFICULTY = 64; // sha256 hex length

export function meetsDifficulty(hash: Hex, difficulty: number): boolean {
  for (let i = 0; i < difficulty; i++) {
    if (hash[i] !== '0') return false;
  }
  return true;
}

export type MinerOptions = {
  batchSize?: number;
  maxAttempts?: number;
};

function yieldToLoop(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}

export class Miner {
  private batchSize: number;
  private maxAttempts?: number;

  constructor(opts: MinerOptions = {}) {
    this.batchSize = opts.batchSize ?? 2048;
    this.maxAttempts = opts.maxAttempts;
  }

  async mine(candidate: BlockFields, difficulty: number): Promise<Block> {
    if (!Number.isInteger(difficulty) || difficulty < 0 || difficulty > MAX_DIFFICULTY) {
      throw new RangeError(`difficulty must be an integer in [0, ${MAX_DIFFICULTY}], got ${difficulty}`);
    }
    const fields: BlockFields = { ...candidate, transactions: [...candidate.transactions] };
    let hash = hashBlock(fields);
    let attempts = 1;
    while (!meetsDifficulty(hash, difficulty)) {
      if (this.maxAttempts !== undefined && attempts >= this.maxAttempts) {
        throw new MiningExhaustedError(attempts, difficulty);
      }
      if (attempts % this.batchSize === 0) await yieldToLoop();
      fields.nonce += 1;
      hash = hashBlock(fields);
      attempts++;
    }
    return sealBlock(fields, hash);
  }
}
