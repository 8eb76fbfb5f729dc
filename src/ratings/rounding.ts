// src/ratings/rounding.ts

/**
 * Round half to even ("banker's rounding") at the given number of decimals.
 * Every integer delta and every stored Glicko-2 value goes through this.
 *
 * Works on the exact decimal expansion of the double, so `0.05` (stored a hair
 * above the half) rounds up at one decimal and `2.675` (a hair below) rounds down.
 */
export function roundHalfEven(value: number, digits = 0): number {
  if (!Number.isFinite(value) || Math.abs(value) >= 1e21) return value;

  // toFixed(100) is the exact expansion for every value this library produces
  const [int = '0', frac = ''] = Math.abs(value).toFixed(100).split('.');
  const kept = BigInt(int + frac.slice(0, digits));
  const rest = frac.slice(digits);
  const head = rest.charAt(0);

  const up = head > '5' || (head === '5' && (/[1-9]/.test(rest.slice(1)) || kept % 2n === 1n));
  const units = (up ? kept + 1n : kept).toString().padStart(digits + 1, '0');
  const text = digits > 0 ? `${units.slice(0, -digits)}.${units.slice(-digits)}` : units;

  const rounded = Number(text);
  // normalise -0
  return (value < 0 ? -rounded : rounded) + 0;
}
