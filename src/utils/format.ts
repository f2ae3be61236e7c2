// CHANGE: Text helpers shared by the table rows and the detail pane.
// WHY: Timestamps render in UTC so output does not depend on the host time zone.

function parseIso(value: string | null): Date | undefined {
  if (!value) {
    return undefined;
  }
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? undefined : date;
}

/**
 * Format an ISO timestamp as `YYYY-MM-DD`.
 *
 * @returns Date part, or undefined for missing or invalid input.
 */
export function formatDate(value: string | null): string | undefined {
  return parseIso(value)?.toISOString().slice(0, 10);
}

/**
 * Format an ISO timestamp as `YYYY-MM-DD HH:MM:SS`.
 */
export function formatTimestamp(value: string | null): string | undefined {
  return parseIso(value)?.toISOString().slice(0, 19).replace("T", " ");
}

/**
 * Shorten text to `width` characters, ending in "..." when cut.
 */
export function truncate(text: string, width: number): string {
  if (text.length <= width) {
    return text;
  }
  return `${text.slice(0, Math.max(0, width - 3))}...`;
}
