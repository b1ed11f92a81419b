export function notNil<T>(value: T | null | undefined): value is T {
  return value !== null && value !== undefined;
}

export function stringifyJSONSafe(value: unknown): string | undefined {
  try {
    return JSON.stringify(value);
  } catch {
    return;
  }
}

/**
 * Shortens text for log fields, counting code points so multi-byte
 * characters are never split.
 */
export function previewText(text: string, maxLength = 100): string {
  const codePoints = Array.from(text);
  if (codePoints.length <= maxLength) {
    return text;
  }
  return codePoints.slice(0, maxLength).join('') + '...';
}
