function hasCustomToString(value: object): boolean {
  return (
    !Array.isArray(value) &&
    !(value instanceof Map) &&
    'toString' in value &&
    typeof value.toString === 'function' &&
    value.toString !== Object.prototype.toString
  );
}

/**
 * Render an arbitrary value as text without throwing.
 * Strings pass through; objects with their own toString use it; maps, arrays and plain objects
 * become JSON.
 */
export function renderText(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value === undefined || value === null) return '';
  if (typeof value === 'function') return `[function ${value.name || 'anonymous'}]`;
  if (typeof value !== 'object') return String(value);

  let text: string | undefined;
  try {
    text = hasCustomToString(value)
      ? String(value)
      : JSON.stringify(value instanceof Map ? Object.fromEntries(value) : value);
  } catch {
    // throwing toString, circular structures, BigInt members
    text = undefined;
  }
  return text ?? Object.prototype.toString.call(value);
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return renderText(error);
}
