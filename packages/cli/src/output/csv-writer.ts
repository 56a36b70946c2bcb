/**
 * CSV Writer
 *
 * RFC 4180 output: CRLF line endings, fields quoted when they contain a
 * comma, a quote or a line break, quotes doubled.
 */

import type { Evidence } from 'tabletrace-core';

export const CSV_COLUMNS = [
  'file_path',
  'line_number',
  'table_name',
  'column_name',
  'reference_type',
  'code_snippet',
  'confidence',
  'schema_verified',
] as const;

const NEEDS_QUOTING = /[",\r\n]/;

export function escapeCsvField(value: string): string {
  return NEEDS_QUOTING.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

function toRow(evidence: Evidence): string[] {
  return [
    evidence.file,
    String(evidence.line),
    evidence.table,
    evidence.column,
    evidence.kind,
    evidence.snippet,
    evidence.confidence,
    String(evidence.schemaVerified),
  ];
}

/**
 * Header plus one row per evidence, each terminated by CRLF.
 */
export function formatCsv(evidence: readonly Evidence[]): string {
  const rows = [[...CSV_COLUMNS], ...evidence.map(toRow)];
  return rows.map(row => `${row.map(escapeCsvField).join(',')}\r\n`).join('');
}
