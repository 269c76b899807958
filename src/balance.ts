import { Block } from './types';

// cache is dropped whenever the chain length changes
export class BalanceIndex {
  private cache = new Map<string, bigint>();
  private cachedAt = -1;

  constructor(private readonly chain: () => readonly Block[]) {}

  balanceOf(address: string | null | undefined): bigint {
    if (!address) return 0n;
    const blocks = this.chain();
    if (blocks.length !== this.cachedAt) {
      this.cache.clear();
      this.cachedAt = blocks.length;
    }
    const addr = address.toLowerCase();
    const hit = this.cache.get(addr);
    if (hit !== undefined) return hit;

    let balance = 0n;
    for (const block of blocks) {
      for (const tx of block.transactions) {
        if (tx.sender.toLowerCase() === addr) balance -= tx.amount;
        if (tx.recipient.toLowerCase() === addr) balance += tx.amount;
      }
    }
    this.cache.set(addr, balance);
    return balance;
  }
}
