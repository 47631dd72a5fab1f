export type TableRow = Record<string, string | number>;

function pad(value: number, width = 2): string {
  return value.toString().padStart(width, '0');
}

// Local ISO-8601 time without zone, seconds precision
export function humanTimestamp(date: Date = new Date()): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
    `T${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

// Compact local time for generated file names: 20250904-120000
export function fileTimestamp(date: Date = new Date()): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `-${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

// Format accepted by `logcat -T`
export function logcatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}.000`
  );
}

/**
 * Render rows as a plain-text table keyed by the first row's columns.
 */
export function formatTable(rows: TableRow[]): string {
  if (rows.length === 0) {
    return '(empty)';
  }

  const headers = Object.keys(rows[0]);
  const widths = headers.map(header =>
    Math.max(header.length, ...rows.map(row => String(row[header] ?? '').length))
  );

  const lines = [
    headers.map((header, i) => header.padEnd(widths[i])).join(' | '),
    widths.map(width => '-'.repeat(width)).join('-+-'),
    ...rows.map(row =>
      headers.map((header, i) => String(row[header] ?? '').padEnd(widths[i])).join(' | ')
    ),
  ];

  return lines.map(line => line.trimEnd()).join('\n');
}

export function formatJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}
