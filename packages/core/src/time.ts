function toMillis(value: string): number {
  const ms = Date.parse(value);
  return Number.isFinite(ms) ? ms : Number.NaN;
}

export function compareTimestamps(a: string, b: string): number {
  const left = toMillis(a);
  const right = toMillis(b);
  if (Number.isNaN(left) || Number.isNaN(right) || left === right) {
    return a.localeCompare(b);
  }
  return left - right;
}

export function earliest(...values: Array<string | null | undefined>): string | null {
  let result: string | null = null;
  for (const value of values) {
    if (!value) {
      continue;
    }
    if (result === null || compareTimestamps(value, result) < 0) {
      result = value;
    }
  }
  return result;
}

export function isOnOrAfter(value: string, reference: string): boolean {
  return compareTimestamps(value, reference) >= 0;
}
