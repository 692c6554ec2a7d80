const DIGITS = /(\d+)/;

/**
 * Compare strings so that digit runs order by value: `call_2` < `call_10`.
 */
export function naturalCompare(a: string, b: string): number {
  const left = a.split(DIGITS);
  const right = b.split(DIGITS);
  const length = Math.min(left.length, right.length);

  for (let i = 0; i < length; i++) {
    const x = left[i] ?? "";
    const y = right[i] ?? "";
    if (x === y) {
      continue;
    }
    // split() with a capture group puts digit runs at odd indices
    if (i % 2 === 1) {
      return compareDigitRuns(x, y);
    }
    return x < y ? -1 : 1;
  }

  return left.length === right.length ? 0 : left.length < right.length ? -1 : 1;
}

/**
 * Digit runs of any length: fewer significant digits is smaller, equal
 * lengths compare as text. Equal values order the shorter run first.
 */
function compareDigitRuns(x: string, y: string): number {
  const a = x.replace(/^0+/, "");
  const b = y.replace(/^0+/, "");
  if (a.length !== b.length) {
    return a.length < b.length ? -1 : 1;
  }
  if (a !== b) {
    return a < b ? -1 : 1;
  }
  return x.length < y.length ? -1 : 1;
}
