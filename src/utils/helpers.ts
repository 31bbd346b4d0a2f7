/**
 * Parse a comma-separated string into an array of trimmed strings
 */
export function parseCommaSeparated(value: string): string[] {
  if (!value || value.trim() === '') {
    return [];
  }
  return value.split(',').map(s => s.trim()).filter(s => s.length > 0);
}
