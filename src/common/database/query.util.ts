/** Escapes LIKE wildcards so user input matches literally. */
export function escapeLikePattern(value: string): string {
  return value.replace(/[\\%_]/g, '\\$&');
}

export function containsPattern(value: string): string {
  return `%${escapeLikePattern(value)}%`;
}
