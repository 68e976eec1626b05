/**
 * Rounds to `digits` decimals the way Python's `round` does: on the exact
 * decimal value of the double, with exact halves going to the even neighbour.
 */
export function roundHalfEven(value: number, digits: number): number {
  const factor = 10 ** digits;
  const scaled = value * factor;
  const floor = Math.floor(scaled);
  if (scaled - floor === 0.5 && (floor + 0.5) / factor === value) {
    return (floor % 2 === 0 ? floor : floor + 1) / factor;
  }
  return Number(value.toFixed(digits));
}
