export const DECIMALS = 8;
export const COIN = 100_000_000n;

const DECIMAL_RE = /^(\d+)(?:\.(\d{1,8}))?$/;

// null unless the value is exact at 8 decimals
export function parseAmount(input: unknown): bigint | null {
  if (typeof input === 'bigint') return input >= 0n ? input : null;
  if (typeof input === 'number') {
    if (!Number.isFinite(input) || input < 0 || input > Number.MAX_SAFE_INTEGER) return null;
    const fixed = input.toFixed(DECIMALS);
    if (Number(fixed) !== input) return null;
    return parseAmount(fixed);
  }
  if (typeof input !== 'string') return null;
  const m = DECIMAL_RE.exec(input.trim());
  if (!m) return null;
  const whole = BigInt(m[1]);
  const frac = BigInt((m[2] ?? '').padEnd(DECIMALS, '0'));
  return whole * COIN + frac;
}

export function formatAmount(units: bigint): string {
  const sign = units < 0n ? '-' : '';
  const abs = units < 0n ? -units : units;
  const whole = abs / COIN;
  const frac = (abs % COIN).toString().padStart(DECIMALS, '0');
  return `${sign}${whole}.${frac}`;
}
