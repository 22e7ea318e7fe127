const NEEDS_QUOTING = /[",\r\n]/;

export function escapeCsvField(value: string): string {
  return NEEDS_QUOTING.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/** Serializes rows as CSV with CRLF line endings after every row. */
export function toCsv(rows: ReadonlyArray<ReadonlyArray<string>>): string {
  return rows
    .map((row) => `${row.map(escapeCsvField).join(',')}\r\n`)
    .join('');
}

/** `YYYY-MM-DD` in UTC. */
export function formatIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/** `YYYYMMDD` in UTC. */
export function formatDateStamp(date: Date): string {
  return formatIsoDate(date).replace(/-/g, '');
}
