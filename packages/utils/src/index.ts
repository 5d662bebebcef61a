export function stringifyJSONSafe(value: unknown): string | undefined {
  try {
    return JSON.stringify(value);
  } catch {
    return;
  }
}

export function sortedUnique<T extends string>(values: Iterable<T>): T[] {
  return Array.from(new Set(values)).sort();
}
