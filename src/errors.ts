export type ValidationCode =
  | 'InvalidAmount'
  | 'InvalidAddress'
  | 'InvalidSignature'
  | 'InsufficientBalance'
  | 'ReservedSender'
  | 'DuplicateTransaction';

export class ValidationError extends Error {
  readonly code: ValidationCode;

  constructor(code: ValidationCode, message: string) {
    super(message);
    this.name = 'ValidationError';
    this.code = code;
  }
}

export class MalformedPeerMessageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MalformedPeerMessageError';
  }
}

export class PeerUnreachableError extends Error {
  readonly peer: string;

  constructor(peer: string, reason: string) {
    super(`peer ${peer} unreachable: ${reason}`);
    this.name = 'PeerUnreachableError';
    this.peer = peer;
  }
}

/** Hash-link or hash/content mismatch inside the local chain. Fatal. */
export class ChainCorruptionError extends Error {
  readonly index: number;

  constructor(index: number, message: string) {
    super(`chain corrupted at block ${index}: ${message}`);
    this.name = 'ChainCorruptionError';
    this.index = index;
  }
}

export class MiningExhaustedError extends Error {
  readonly attempts: number;

  constructor(attempts: number, difficulty: number) {
    super(`no nonce found after ${attempts} attempts at difficulty ${difficulty}`);
    this.name = 'MiningExhaustedError';
    this.attempts = attempts;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
