/**
 * Round to one decimal place. Exact ties (x.x5 values that are exactly
 * representable, e.g. 12.25) go to the even digit, everything else to the
 * nearest tenth of the value actually stored.
 */
export function roundToTenth(value: number): number {
  const isExactTie = Number.isInteger(value * 4) && !Number.isInteger(value * 2);
  if (isExactTie) {
    const lower = Math.floor(value * 10);
    const even = lower % 2 === 0 ? lower : lower + 1;
    return even / 10;
  }
  return Number(value.toFixed(1));
}
