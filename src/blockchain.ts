import { formatAmount } from './amount';
import { BalanceIndex } from './balance';
import { hashBlock, sealBlock, toBlockJson, transactionId } from './codec';
import { ChainCorruptionError, ValidationError } from './errors';
import { Miner, meetsDifficulty } from './miner';
import {
  Block, BlockJson, Hex, LedgerEvent, Logger, Origin, Result, SYSTEM_SENDER, Transaction, TransactionRequest,
} from './types';
import { LedgerView, TransactionValidator } from './validator';

export const GENESIS_PREVIOUS_HASH = '0';
// fixed so that every node starts from the same genesis hash
export const GENESIS_TIMESTAMP = 0;

/** `reserve` counts a sender's pending outgoing transfers against what they can still spend. */
export type PendingPolicy = 'reserve' | 'committed';

export type LedgerOptions = {
  difficulty?: number;
  miningReward?: bigint;
  miner?: Miner;
  validator?: TransactionValidator;
  pendingPolicy?: PendingPolicy;
  clock?: () => number;
  logger?: Logger;
};

export type PeerBlockOutcome =
  | { status: 'accepted'; block: Block }
  | { status: 'stale'; reason: string }
  | { status: 'rejected'; reason: string };

type Listener = (event: LedgerEvent) => void;

function isSystem(address: string): boolean {
  return address.toLowerCase() === SYSTEM_SENDER;
}

/** Full integrity walk. Throws on the first broken block; never repairs. */
export function verifyChain(blocks: readonly Block[], difficulty: number): void {
  blocks.forEach((block, i) => {
    if (hashBlock(block) !== block.hash) throw new ChainCorruptionError(i, 'stored hash differs from recomputed hash');
    if (i === 0) {
      if (block.previousHash !== GENESIS_PREVIOUS_HASH) throw new ChainCorruptionError(0, 'genesis previousHash must be "0"');
      return;
    }
    if (block.previousHash !== blocks[i - 1].hash) throw new ChainCorruptionError(i, 'previousHash does not link to prior block');
    if (!meetsDifficulty(block.hash, difficulty)) throw new ChainCorruptionError(i, 'hash does not meet difficulty');
  });
}

export class Ledger implements LedgerView {
  readonly difficulty: number;
  readonly miningReward: bigint;
  readonly pendingPolicy: PendingPolicy;

  private chain: Block[];
  private pending: Transaction[] = [];
  private pendingIds = new Set<Hex>();
  private balances: BalanceIndex;
  private miner: Miner;
  private validator: TransactionValidator;
  private clock: () => number;
  private logger: Logger;
  private listeners = new Set<Listener>();
  // mine and peer-block adoption run one at a time, in arrival order
  private queue: Promise<unknown> = Promise.resolve();

  constructor(opts: LedgerOptions = {}) {
    this.difficulty = opts.difficulty ?? 3;
    this.miningReward = opts.miningReward ?? 10n * 100_000_000n;
    this.pendingPolicy = opts.pendingPolicy ?? 'reserve';
    this.miner = opts.miner ?? new Miner();
    this.validator = opts.validator ?? new TransactionValidator();
    this.clock = opts.clock ?? Date.now;
    this.logger = opts.logger ?? console;
    this.chain = [this.createGenesis()];
    this.balances = new BalanceIndex(() => this.chain);
  }

  private createGenesis(): Block {
    const fields = { timestamp: GENESIS_TIMESTAMP, transactions: [], previousHash: GENESIS_PREVIOUS_HASH, nonce: 0 };
    return sealBlock(fields, hashBlock(fields));
  }

  get height(): number {
    return this.chain.length;
  }

  latestBlock(): Block {
    return this.chain[this.chain.length - 1];
  }

  blocks(): readonly Block[] {
    return this.chain;
  }

  pendingTransactions(): readonly Transaction[] {
    return [...this.pending];
  }

  subscribe(listener: Listener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private emit(event: LedgerEvent) {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (e) {
        this.logger.error('ledger listener failed:', e);
      }
    }
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    this.queue = run.catch(() => undefined);
    return run;
  }

  balanceOf(address: string | null | undefined): bigint {
    return this.balances.balanceOf(address);
  }

  spendableBalance(address: string): bigint {
    const committed = this.balances.balanceOf(address);
    if (this.pendingPolicy === 'committed') return committed;
    const addr = address.toLowerCase();
    let reserved = 0n;
    for (const tx of this.pending) {
      if (tx.sender.toLowerCase() === addr) reserved += tx.amount;
    }
    return committed - reserved;
  }

  /**
   * Validate and enqueue a transfer. Never mutates state on failure.
   * The reserved `system` sender is refused here, whatever the origin.
   */
  submitTransaction(request: TransactionRequest, origin: Origin = 'local'): Result<Transaction, ValidationError> {
    if (typeof request.sender === 'string' && isSystem(request.sender)) {
      return { ok: false, error: new ValidationError('ReservedSender', `sender "${SYSTEM_SENDER}" is reserved for mining rewards`) };
    }
    const result = this.validator.validate(request, this);
    if (!result.ok) return result;

    const tx = result.value;
    const id = transactionId(tx);
    if (this.pendingIds.has(id)) {
      return { ok: false, error: new ValidationError('DuplicateTransaction', `transaction ${id} is already pending`) };
    }
    this.pending.push(tx);
    this.pendingIds.add(id);
    this.emit({ type: 'transaction', tx, origin });
    return result;
  }

  /**
   * Seal the current pending pool plus a reward for `minerAddress`.
   * Transactions that arrive while the nonce search runs stay pending for
   * the next block.
   */
  mine(minerAddress: string): Promise<Block> {
    if (!minerAddress) {
      return Promise.reject(new ValidationError('InvalidAddress', 'miner address is required'));
    }
    return this.exclusive(async () => {
      const batch = [...this.pending];
      const reward: Transaction = { sender: SYSTEM_SENDER, recipient: minerAddress, amount: this.miningReward };
      const tip = this.latestBlock();
      const block = await this.miner.mine({
        timestamp: this.clock(),
        transactions: [...batch, reward],
        previousHash: tip.hash,
        nonce: 0,
      }, this.difficulty);

      this.append(block);
      this.removePending(new Set(batch));
      this.logger.log(`mined block ${this.chain.length - 1} ${block.hash} with ${block.transactions.length} tx(s)`);
      this.emit({ type: 'block', block, origin: 'local' });
      return block;
    });
  }

  private append(block: Block) {
    const tip = this.latestBlock();
    if (block.previousHash !== tip.hash) {
      throw new ChainCorruptionError(this.chain.length, `previousHash ${block.previousHash} does not link to tip ${tip.hash}`);
    }
    this.chain.push(block);
  }

  private removePending(included: Set<Transaction>) {
    this.pending = this.pending.filter(tx => !included.has(tx));
    this.pendingIds = new Set(this.pending.map(transactionId));
  }

  /**
   * Adopt a block a peer claims to have mined, only when it extends our tip
   * and checks out in full. There is no fork choice: anything that does not
   * build on the current tip is reported stale and ignored.
   */
  acceptPeerBlock(block: Block): Promise<PeerBlockOutcome> {
    return this.exclusive(async (): Promise<PeerBlockOutcome> => {
      const tip = this.latestBlock();
      if (block.previousHash !== tip.hash) {
        return { status: 'stale', reason: `does not extend tip ${tip.hash}` };
      }
      const problem = this.checkPeerBlock(block);
      if (problem) return { status: 'rejected', reason: problem };

      this.append(block);
      const included = new Set(block.transactions.map(transactionId));
      const survivors = this.pending.filter(tx => !included.has(transactionId(tx)));
      this.pending = [];
      this.pendingIds.clear();
      for (const tx of survivors) {
        const res = this.submitQuietly(tx);
        if (!res.ok) this.logger.warn(`dropped pending tx after peer block: ${res.error.message}`);
      }
      this.logger.log(`adopted peer block ${this.chain.length - 1} ${block.hash}`);
      this.emit({ type: 'block', block, origin: 'peer' });
      return { status: 'accepted', block };
    });
  }

  // re-admit a pending transaction against the new tip without events
  private submitQuietly(tx: Transaction): Result<Transaction, ValidationError> {
    const res = this.validator.validate(tx, this);
    if (res.ok) {
      this.pending.push(tx);
      this.pendingIds.add(transactionId(tx));
    }
    return res;
  }

  private checkPeerBlock(block: Block): string | null {
    if (hashBlock(block) !== block.hash) return 'hash does not match block contents';
    if (!meetsDifficulty(block.hash, this.difficulty)) return `hash does not meet difficulty ${this.difficulty}`;

    const txs = block.transactions;
    const reward = txs[txs.length - 1];
    if (!reward || reward.sender !== SYSTEM_SENDER) return 'block must end with a reward transaction';
    if (reward.amount !== this.miningReward) return `reward ${formatAmount(reward.amount)} is not ${formatAmount(this.miningReward)}`;

    // replay the transfers in order against committed balances plus what the block already moved
    const moved = new Map<string, bigint>();
    const view: LedgerView = {
      spendableBalance: address => this.balances.balanceOf(address) + (moved.get(address.toLowerCase()) ?? 0n),
    };
    for (const tx of txs.slice(0, -1)) {
      if (isSystem(tx.sender)) return 'only the final transaction may be a reward';
      const res = this.validator.validate(tx, view);
      if (!res.ok) return `${res.error.code}: ${res.error.message}`;
      const from = tx.sender.toLowerCase();
      const to = tx.recipient.toLowerCase();
      moved.set(from, (moved.get(from) ?? 0n) - tx.amount);
      moved.set(to, (moved.get(to) ?? 0n) + tx.amount);
    }
    return null;
  }

  verifyChain(): void {
    verifyChain(this.chain, this.difficulty);
  }

  dumpChain(): BlockJson[] {
    return this.chain.map(toBlockJson);
  }
}
