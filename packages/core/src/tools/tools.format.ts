const usdFormat = (digits: number) =>
  new Intl.NumberFormat('en-US', { minimumFractionDigits: digits, maximumFractionDigits: digits });

/** `$1,234.56`; small prices get more decimals. */
export function usd(value: number, digits = 2): string {
  return `$${usdFormat(digits).format(value)}`;
}

export function pct(value: number): string {
  return `${value.toFixed(2)}%`;
}

export function percentChange(from: number, to: number): number {
  return from === 0 ? 0 : ((to - from) / from) * 100;
}

/** YYYY-MM-DD in UTC. */
export function isoDate(epochMs: number): string {
  return new Date(epochMs).toISOString().slice(0, 10);
}

export function shortAddress(address: string): string {
  return address.length > 12 ? `${address.slice(0, 6)}...${address.slice(-4)}` : address;
}

export function daysAgo(days: number, now: number = Date.now()): Date {
  return new Date(now - days * 86_400_000);
}
