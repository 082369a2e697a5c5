// Balances are never stored below zero.
export function clampCredits(value: number): number {
  return Math.max(0, value);
}
