import { formatAmount, parseAmount } from './amount';
import { Block, BlockFields, BlockJson, Hex, Transaction, TransactionJson } from './types';
import { sha256Hex } from './utils/crypto';

type Canonical = string | number | boolean | null | Canonical[] | { [key: string]: Canonical };

/** JSON with object keys sorted at every level and no whitespace. */
export function canonicalJson(value: Canonical): string {
  if (Array.isArray(value)) return `[${value.map(canonicalJson).join(',')}]`;
  if (value !== null && typeof value === 'object') {
    const keys = Object.keys(value).sort();
    return `{${keys.map(k => `${JSON.stringify(k)}:${canonicalJson(value[k])}`).join(',')}}`;
  }
  return JSON.stringify(value);
}

// the exact text a wallet signs
export function signingMessage(tx: Pick<Transaction, 'sender' | 'recipient' | 'amount'>): string {
  return `${tx.sender}->${tx.recipient}:${formatAmount(tx.amount)}`;
}

function txHashView(tx: Transaction): { [key: string]: Canonical } {
  return { sender: tx.sender, recipient: tx.recipient, amount: formatAmount(tx.amount) };
}

export function encodeTransaction(tx: Transaction): string {
  return canonicalJson(txHashView(tx));
}

export function encodeBlock(fields: BlockFields): string {
  return canonicalJson({
    timestamp: fields.timestamp,
    transactions: fields.transactions.map(txHashView),
    previousHash: fields.previousHash,
    nonce: fields.nonce,
  });
}

export function hashBlock(fields: BlockFields): Hex {
  return sha256Hex(encodeBlock(fields));
}

export function transactionId(tx: Transaction): Hex {
  return sha256Hex(`${encodeTransaction(tx)}|${tx.signature ?? ''}`);
}

export function sealBlock(fields: BlockFields, hash: Hex): Block {
  return Object.freeze({
    timestamp: fields.timestamp,
    transactions: Object.freeze(fields.transactions.map(tx => Object.freeze({ ...tx }))),
    previousHash: fields.previousHash,
    nonce: fields.nonce,
    hash,
  });
}

export function toTransactionJson(tx: Transaction): TransactionJson {
  return {
    sender: tx.sender,
    recipient: tx.recipient,
    amount: formatAmount(tx.amount),
    signature: tx.signature ?? null,
  };
}

export function toBlockJson(block: Block): BlockJson {
  return {
    timestamp: block.timestamp,
    transactions: block.transactions.map(toTransactionJson),
    hash: block.hash,
    previousHash: block.previousHash,
    nonce: block.nonce,
  };
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function isSafeUint(v: unknown): v is number {
  return typeof v === 'number' && Number.isSafeInteger(v) && v >= 0;
}

export function fromTransactionJson(v: unknown): Transaction | null {
  if (!isRecord(v)) return null;
  const { sender, recipient, signature } = v;
  const amount = parseAmount(v.amount);
  if (typeof sender !== 'string' || typeof recipient !== 'string' || amount === null) return null;
  if (signature !== undefined && signature !== null && typeof signature !== 'string') return null;
  const tx: Transaction = { sender, recipient, amount };
  if (typeof signature === 'string') tx.signature = signature;
  return tx;
}

/** Decodes a full block; returns null for anything short of one (e.g. an announcement). */
export function fromBlockJson(v: unknown): Block | null {
  if (!isRecord(v)) return null;
  const { timestamp, previousHash, nonce, hash } = v;
  if (!isSafeUint(timestamp) || !isSafeUint(nonce)) return null;
  if (typeof previousHash !== 'string' || typeof hash !== 'string') return null;
  if (!Array.isArray(v.transactions)) return null;
  const transactions: Transaction[] = [];
  for (const raw of v.transactions) {
    const tx = fromTransactionJson(raw);
    if (!tx) return null;
    transactions.push(tx);
  }
  return sealBlock({ timestamp, transactions, previousHash, nonce }, hash);
}
