/**
 * Shared parsing helpers for environment/config input.
 */

export function nonEmpty(raw?: string): string | undefined {
  const trimmed = raw?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Strictly positive, finite number from a string or a YAML number.
 * Anything else (including "0", "-3", "3 minutes") is undefined.
 */
export function parsePositiveNumber(raw: unknown): number | undefined {
  if (typeof raw === 'number') {
    return Number.isFinite(raw) && raw > 0 ? raw : undefined;
  }
  if (typeof raw !== 'string' || !raw.trim()) return undefined;
  const parsed = Number(raw);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : undefined;
}
