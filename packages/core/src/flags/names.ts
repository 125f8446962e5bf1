/** Positional entries are named "?<index>" wherever a flag name is expected. */
export const POSITIONAL_PREFIX = "?";

export function positionalName(index: number): string {
  return `${POSITIONAL_PREFIX}${index}`;
}

/**
 * Read the index out of a "?N" name. Returns undefined for ordinary flag
 * names and NaN for a "?" followed by something other than a plain integer.
 */
export function positionalIndex(name: string): number | undefined {
  if (!name.startsWith(POSITIONAL_PREFIX)) return undefined;
  const digits = name.slice(POSITIONAL_PREFIX.length);
  return /^\d+$/.test(digits) ? Number(digits) : Number.NaN;
}
