import { describe, expect, it } from 'vitest';
import { loadConfig } from '../config';
import { ConfigError } from '../errors';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    expect(loadConfig({})).toEqual({
      port: 5000,
      p2pPort: 6000,
      peers: [],
      difficulty: 3,
      miningReward: 1_000_000_000n,
      pendingPolicy: 'reserve',
      gossipTimeoutMs: 5000,
      gossipMaxInFlight: 32,
    });
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      PORT: '8080',
      PEERS: 'ws://a:6000, ws://b:6001,,',
      DIFFICULTY: '4',
      MINING_REWARD: '2.5',
      PENDING_POLICY: 'committed',
      MAX_MINING_ATTEMPTS: '1000000',
    });
    expect(config.port).toBe(8080);
    expect(config.peers).toEqual(['ws://a:6000', 'ws://b:6001']);
    expect(config.difficulty).toBe(4);
    expect(config.miningReward).toBe(250_000_000n);
    expect(config.pendingPolicy).toBe('committed');
    expect(config.maxMiningAttempts).toBe(1_000_000);
  });

  it('refuses bad values', () => {
    expect(() => loadConfig({ DIFFICULTY: 'three' })).toThrow(ConfigError);
    expect(() => loadConfig({ DIFFICULTY: '65' })).toThrow('DIFFICULTY must be at most 64');
    expect(() => loadConfig({ MINING_REWARD: '-1' })).toThrow(ConfigError);
    expect(() => loadConfig({ PENDING_POLICY: 'yolo' })).toThrow(ConfigError);
    expect(() => loadConfig({ PEERS: 'http://a:1' })).toThrow('peer "http://a:1" must be a ws:// or wss:// URI');
    expect(() => loadConfig({ GOSSIP_TIMEOUT_MS: '0' })).toThrow('GOSSIP_TIMEOUT_MS must be an integer >= 1, got "0"');
  });
});
