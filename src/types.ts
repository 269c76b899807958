export type Hex = string;

export const SYSTEM_SENDER = 'system';

export type Transaction = {
  sender: string;
  recipient: string;
  amount: bigint; // base units, 1e-8
  signature?: Hex;
};

// what a caller (HTTP body, peer frame) hands us before validation
export type TransactionRequest = {
  sender?: unknown;
  recipient?: unknown;
  amount?: unknown;
  signature?: unknown;
};

export type BlockFields = {
  timestamp: number; // ms since epoch
  transactions: readonly Transaction[];
  previousHash: Hex;
  nonce: number;
};

export type Block = Readonly<BlockFields & { hash: Hex }>;

export type TransactionJson = {
  sender: string;
  recipient: string;
  amount: string;
  signature: Hex | null;
};

export type BlockJson = {
  timestamp: number;
  transactions: TransactionJson[];
  hash: Hex;
  previousHash: Hex;
  nonce: number;
};

export type BlockAnnouncement = {
  timestamp: number;
  hash: Hex;
};

export type GossipMessage =
  | { type: 'new_tx'; data: TransactionJson }
  | { type: 'new_block'; data: BlockJson | BlockAnnouncement };

export type Origin = 'local' | 'peer';

export type LedgerEvent =
  | { type: 'transaction'; tx: Transaction; origin: Origin }
  | { type: 'block'; block: Block; origin: Origin };

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export type Logger = Pick<Console, 'log' | 'warn' | 'error'>;
