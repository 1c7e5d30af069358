/**
 * Parse a raw sensor reading (a file's or a process's text output).
 * Returns null unless the trimmed text is a single finite number.
 */
export function parseReading(raw: string): number | null {
  const text = raw.trim();
  if (text === '') return null;
  const value = Number(text);
  return Number.isFinite(value) ? value : null;
}
