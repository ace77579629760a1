// src/engine/format.ts
import type { NumericRange } from './types.js';

// One decimal place, ties to even. Only quarters (x.25, x.75) are exact
// binary ties at one decimal; toFixed would round those away from zero.
function formatBound(n: number): string {
  if (Number.isInteger(n)) return String(n);
  const abs = Math.abs(n);
  if (Number.isInteger(abs * 4) && !Number.isInteger(abs * 2)) {
    const down = Math.floor(abs * 10);
    const tenths = down % 2 === 0 ? down : down + 1;
    return `${n < 0 ? '-' : ''}${(tenths / 10).toFixed(1)}`;
  }
  return n.toFixed(1);
}

// e.g. "12 - 15.5 g/dL"
export function formatReferenceRange(range: NumericRange, unit: string): string {
  return `${formatBound(range.low)} - ${formatBound(range.high)} ${unit}`;
}
