/**
 * Sum of two numbers. Integers stay exact up to Number.MAX_SAFE_INTEGER.
 */
export function add(x: number, y: number): number {
  return x + y;
}
