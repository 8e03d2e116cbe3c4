export interface KeyValue {
  key: string;
  value: string;
}

/** Aligned `key  value` lines, indented by two spaces. */
export function formatKeyValues(pairs: KeyValue[]): string {
  if (pairs.length === 0) return '';
  const width = Math.max(...pairs.map(p => p.key.length));
  return pairs.map(p => `  ${p.key.padEnd(width)}  ${p.value}`).join('\n');
}

export function formatTable(headers: string[], rows: string[][]): string {
  const widths = headers.map((header, column) =>
    Math.max(header.length, ...rows.map(row => (row[column] ?? '').length))
  );
  const line = (cells: string[]): string =>
    cells
      .map((cell, column) => cell.padEnd(widths[column]))
      .join('  ')
      .trimEnd();

  return [line(headers), line(widths.map(w => '-'.repeat(w))), ...rows.map(line)].join('\n');
}

export function formatJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

export function formatRollout(rollout: number): string {
  return `${Number.isInteger(rollout) ? rollout : rollout.toFixed(1)}%`;
}
