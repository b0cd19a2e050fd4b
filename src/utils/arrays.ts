import { GROWTH_FACTOR } from "./constants";

/**
 * Grow a number[] to hold at least `min_capacity` elements.
 * Doubles from the current length until sufficient, fills new slots
 * with `fill`, and copies existing data into the new buffer.
 */
export function grow_number_array(
  arr: number[],
  min_capacity: number,
  fill: number,
): number[] {
  let cap = Math.max(arr.length, 1);
  while (cap < min_capacity) cap *= GROWTH_FACTOR;
  const next: number[] = new Array(cap).fill(fill);
  for (let i = 0; i < arr.length; i++) next[i] = arr[i];
  return next;
}
