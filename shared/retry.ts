import { BACKOFF } from '../ble-bridge/BleBridgeConstants';

// Delay after the n-th consecutive failure (n starts at 1): min(base * 2^(n-1), max)
export function calculateBackoff(
  failures: number,
  baseDelayMs: number,
  maxDelayMs: number,
  multiplier: number = BACKOFF.MULTIPLIER
): number {
  const exponent = Math.max(0, failures - 1);
  return Math.min(baseDelayMs * Math.pow(multiplier, exponent), maxDelayMs);
}

// Step an in-flight back-off value forward
export function nextBackoff(currentMs: number, maxDelayMs: number, multiplier: number = BACKOFF.MULTIPLIER): number {
  return Math.min(currentMs * multiplier, maxDelayMs);
}

// Clip a wait so it never overshoots an absolute deadline (null = no deadline)
export function clipToDeadline(durationMs: number, now: number, deadline: number | null): number {
  if (deadline === null) return durationMs;
  return Math.max(0, Math.min(durationMs, deadline - now));
}
