import { Mock, vi } from 'vitest';
import { Ledger, LedgerOptions } from '../blockchain';
import { Miner } from '../miner';
import { Block, BlockFields, Logger } from '../types';
import { generateKeyPair, KeyPair } from '../utils/crypto';

export const T0 = 1_700_000_000_000;

export type SpyLogger = Logger & { log: Mock; warn: Mock; error: Mock };

export function silentLogger(): SpyLogger {
  return { log: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

export function newLedger(opts: LedgerOptions = {}): Ledger {
  return new Ledger({ difficulty: 2, clock: () => T0, logger: silentLogger(), ...opts });
}

/** Ledger whose chain already pays one block reward to a fresh key. */
export async function fundedLedger(opts: LedgerOptions = {}): Promise<{ ledger: Ledger; alice: KeyPair }> {
  const ledger = newLedger(opts);
  const alice = generateKeyPair();
  await ledger.mine(alice.publicKey);
  return { ledger, alice };
}

export function flipLastHex(hex: string): string {
  const last = hex[hex.length - 1];
  return hex.slice(0, -1) + (last === '0' ? '1' : '0');
}

/** Holds the nonce search until released, so tests can act mid-mine. */
export class GatedMiner extends Miner {
  private gate: Promise<void> = Promise.resolve();
  private entered: () => void = () => {};

  hold(): { started: Promise<void>; release: () => void } {
    let release = () => {};
    this.gate = new Promise<void>(r => {
      release = () => r();
    });
    const started = new Promise<void>(r => {
      this.entered = () => r();
    });
    return { started, release };
  }

  async mine(candidate: BlockFields, difficulty: number): Promise<Block> {
    this.entered();
    await this.gate;
    return super.mine(candidate, difficulty);
  }
}
