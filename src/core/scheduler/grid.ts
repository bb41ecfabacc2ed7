/**
 * Integer grid arithmetic on the tiny-sample clock.
 */

function gcd(a: number, b: number): number {
  let x = Math.abs(a);
  let y = Math.abs(b);
  while (y !== 0) {
    const t = x % y;
    x = y;
    y = t;
  }
  return x;
}

export function lcm(a: number, b: number): number {
  if (a === 0 || b === 0) return Math.max(a, b);
  return (a / gcd(a, b)) * b;
}

export function lcmAll(values: Iterable<number>, fallback = 1): number {
  let result = 0;
  for (const v of values) result = lcm(result, v);
  return result === 0 ? fallback : result;
}

export function ceilToGrid(t: number, grid: number): number {
  return Math.ceil(t / grid) * grid;
}

export function floorToGrid(t: number, grid: number): number {
  return Math.floor(t / grid) * grid;
}

