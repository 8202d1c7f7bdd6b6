/**
 * Request bodies arrive as JSON or as url-encoded forms, where every value is a string
 */
export function asRecord(value: unknown): Record<string, unknown> {
  return typeof value === 'object' && value !== null ? { ...value } : {};
}

export function readString(body: Record<string, unknown>, key: string): string | null {
  const value = body[key];
  if (typeof value === 'number') return String(value);
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

export function readInt(body: Record<string, unknown>, key: string): number | null {
  const value = body[key];
  const parsed = typeof value === 'number' ? value : parseInt(typeof value === 'string' ? value : '', 10);
  return Number.isInteger(parsed) ? parsed : null;
}

/**
 * A JSON array of strings, or a comma separated form value
 */
export function readStringList(body: Record<string, unknown>, key: string): string[] {
  const value = body[key];
  if (Array.isArray(value)) {
    return value.filter((item): item is string => typeof item === 'string');
  }
  if (typeof value === 'string') {
    return value.split(',').map(item => item.trim()).filter(item => item.length > 0);
  }
  return [];
}
