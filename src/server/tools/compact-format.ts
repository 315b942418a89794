/**
 * Compact TSV serialization for MCP tool responses
 */

import { Buffer } from 'node:buffer';

export type CompactField = string | number | boolean | null | undefined;
export type CompactRecord = Record<string, CompactField>;

function sanitizeCompactValue(value: CompactField): string {
  if (value == null) return '';
  return String(value)
    .replaceAll('\t', '    ')
    .replaceAll('\r\n', '\\n')
    .replaceAll('\n', '\\n')
    .replaceAll('\r', '\\n');
}

/**
 * Render records as TSV: header row + one row per record.
 */
export function formatCompactTable(
  records: CompactRecord[],
  opts?: { columns?: string[] }
): string {
  const columns = opts?.columns?.length
    ? opts.columns
    : Array.from(
        records.reduce((keys, record) => {
          for (const key of Object.keys(record)) {
            keys.add(key);
          }
          return keys;
        }, new Set<string>())
      );

  if (columns.length === 0) {
    return '';
  }

  const header = columns.join('\t');
  const rows = records.map((record) =>
    columns.map((column) => sanitizeCompactValue(record[column])).join('\t')
  );
  return [header, ...rows].join('\n');
}

/**
 * Enforce a UTF-8 byte budget with deterministic truncation marker.
 */
export function enforceOutputBudget(output: string, maxBytes: number): string {
  if (maxBytes <= 0) return '';

  const marker = '\n...[truncated]';
  if (Buffer.byteLength(output, 'utf8') <= maxBytes) {
    return output;
  }

  if (Buffer.byteLength(marker, 'utf8') >= maxBytes) {
    return marker.slice(0, maxBytes);
  }

  const allowedBytes = maxBytes - Buffer.byteLength(marker, 'utf8');
  const buffer = Buffer.from(output, 'utf8');
  let truncated = buffer.toString('utf8', 0, allowedBytes);

  while (Buffer.byteLength(truncated, 'utf8') > allowedBytes) {
    truncated = truncated.slice(0, -1);
  }

  return `${truncated}${marker}`;
}

// A type alias, not an interface: the SDK's result type carries an index signature
export type ToolResponse = {
  content: Array<{ type: 'text'; text: string }>;
};

export function textResponse(text: string): ToolResponse {
  return {
    content: [
      {
        type: 'text',
        text,
      },
    ],
  };
}
