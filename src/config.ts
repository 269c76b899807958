import { parseAmount } from './amount';
import { PendingPolicy } from './blockchain';
import { ConfigError } from './errors';
import { MAX_DIFFICULTY } from './miner';

export type NodeConfig = {
  port: number;
  p2pPort: number;
  peers: string[];
  difficulty: number;
  miningReward: bigint;
  pendingPolicy: PendingPolicy;
  gossipTimeoutMs: number;
  gossipMaxInFlight: number;
  maxMiningAttempts?: number;
};

type Env = Record<string, string | undefined>;

function intFrom(env: Env, key: string, fallback: number, min = 0): number {
  const raw = env[key];
  if (raw === undefined || raw === '') return fallback;
  const n = Number(raw);
  if (!Number.isSafeInteger(n) || n < min) throw new ConfigError(`${key} must be an integer >= ${min}, got "${raw}"`);
  return n;
}

export function loadConfig(env: Env = process.env): NodeConfig {
  const difficulty = intFrom(env, 'DIFFICULTY', 3);
  if (difficulty > MAX_DIFFICULTY) throw new ConfigError(`DIFFICULTY must be at most ${MAX_DIFFICULTY}`);

  const miningReward = parseAmount(env.MINING_REWARD || '10');
  if (miningReward === null) throw new ConfigError(`MINING_REWARD "${env.MINING_REWARD}" is not an 8-decimal amount`);

  const policy = env.PENDING_POLICY || 'reserve';
  if (policy !== 'reserve' && policy !== 'committed') {
    throw new ConfigError(`PENDING_POLICY must be "reserve" or "committed", got "${policy}"`);
  }

  const peers = (env.PEERS || '').split(',').map(p => p.trim()).filter(p => p.length > 0);
  for (const peer of peers) {
    if (!/^wss?:\/\//.test(peer)) throw new ConfigError(`peer "${peer}" must be a ws:// or wss:// URI`);
  }

  const config: NodeConfig = {
    port: intFrom(env, 'PORT', 5000),
    p2pPort: intFrom(env, 'P2P_PORT', 6000),
    peers,
    difficulty,
    miningReward,
    pendingPolicy: policy,
    gossipTimeoutMs: intFrom(env, 'GOSSIP_TIMEOUT_MS', 5000, 1),
    gossipMaxInFlight: intFrom(env, 'GOSSIP_MAX_IN_FLIGHT', 32, 1),
  };
  if (env.MAX_MINING_ATTEMPTS) config.maxMiningAttempts = intFrom(env, 'MAX_MINING_ATTEMPTS', 0, 1);
  return config;
}
