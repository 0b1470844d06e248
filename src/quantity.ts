const MEMORY_UNITS: Record<string, number> = {
  Ki: 1024,
  Mi: 1024 ** 2,
  Gi: 1024 ** 3,
  Ti: 1024 ** 4,
  K: 1000,
  M: 1000 ** 2,
  G: 1000 ** 3,
  T: 1000 ** 4,
};

const QUANTITY_PATTERN = /^(\d+(?:\.\d+)?)(Ki|Mi|Gi|Ti|K|M|G|T)?$/;

/**
 * Parse a memory quantity into bytes.
 * Supports plain byte counts and the binary/decimal suffixes (Ki, Mi, Gi, Ti, K, M, G, T).
 * Returns null for anything else.
 */
export function parseMemory(memory: string | number): number | null {
  if (typeof memory === 'number') {
    return Number.isFinite(memory) && memory >= 0 ? Math.floor(memory) : null;
  }

  const match = QUANTITY_PATTERN.exec(memory.trim());
  if (!match) {
    return null;
  }

  const [, amount, suffix] = match;
  const multiplier = suffix ? MEMORY_UNITS[suffix] : 1;
  return Math.floor(parseFloat(amount) * multiplier);
}

/**
 * Render bytes the way the placeholder container requests them.
 */
export function formatMemory(bytes: number): string {
  return String(Math.floor(bytes));
}
