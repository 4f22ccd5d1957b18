// src/export/Exporter.ts

import { promises as fs } from 'fs';
import * as path from 'path';
import { LoggerLike, noopLogger } from '../observability/types';

export const EXPORT_FORMATS = ['csv', 'html', 'json', 'xml'] as const;
export type ExportFormat = (typeof EXPORT_FORMATS)[number];

export interface ExportOptions {
  formats: readonly ExportFormat[];
  outputDir: string;
  /** File name without extension. Defaults to a timestamp. */
  filename?: string;
  logger?: LoggerLike;
}

export type Cell = string | number | boolean | null;
export type ExportRow = Record<string, Cell>;

export function isExportFormat(value: string): value is ExportFormat {
  return EXPORT_FORMATS.some((format) => format === value);
}

function toCell(value: unknown): Cell {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  return JSON.stringify(value);
}

/**
 * One flat row per record. Nested values are JSON-encoded.
 */
export function toRows(records: readonly object[]): ExportRow[] {
  return records.map((record) => {
    const row: ExportRow = {};
    for (const [key, value] of Object.entries(record)) {
      row[key] = toCell(value);
    }
    return row;
  });
}

/** Column names across all rows, in first-seen order. */
export function columnsOf(rows: readonly ExportRow[]): string[] {
  const columns = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) columns.add(key);
  }
  return Array.from(columns);
}

function csvField(value: Cell | undefined): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  const text = String(value);
  return /[,"\n\r]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function toCsv(rows: readonly ExportRow[]): string {
  const columns = columnsOf(rows);
  const lines = [
    columns.map(csvField).join(','),
    ...rows.map((row) => columns.map((column) => csvField(row[column])).join(',')),
  ];
  return `${lines.join('\n')}\n`;
}

function escapeMarkup(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

function markupText(value: Cell | undefined): string {
  return value === null || value === undefined ? '' : escapeMarkup(String(value));
}

export function toHtml(rows: readonly ExportRow[], title: string): string {
  const columns = columnsOf(rows);
  const head = columns.map((column) => `<th>${escapeMarkup(column)}</th>`).join('');
  const body = rows
    .map((row) => `    <tr>${columns.map((column) => `<td>${markupText(row[column])}</td>`).join('')}</tr>`)
    .join('\n');

  return [
    '<!DOCTYPE html>',
    '<html>',
    '<head>',
    '  <meta charset="utf-8">',
    `  <title>${escapeMarkup(title)}</title>`,
    '</head>',
    '<body>',
    '  <table>',
    `    <tr>${head}</tr>`,
    ...(body ? [body] : []),
    '  </table>',
    '</body>',
    '</html>',
    '',
  ].join('\n');
}

// Keys come from upstream JSON; anything outside a conservative XML name is replaced
function xmlName(key: string): string {
  const name = key.replace(/[^A-Za-z0-9_.-]/g, '_');
  return /^[A-Za-z_]/.test(name) ? name : `_${name}`;
}

export function toXml(rows: readonly ExportRow[]): string {
  const records = rows.map((row) => {
    const fields = Object.entries(row).map(([key, value]) => {
      const name = xmlName(key);
      return value === null ? `    <${name}/>` : `    <${name}>${markupText(value)}</${name}>`;
    });
    return ['  <record>', ...fields, '  </record>'].join('\n');
  });

  return ['<?xml version="1.0" encoding="UTF-8"?>', '<records>', ...records, '</records>', ''].join('\n');
}

/** `YYYY-MM-DD_HH-mm-ss` in local time. */
export function timestampFilename(date: Date = new Date()): string {
  const pad = (value: number) => String(value).padStart(2, '0');
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
    `_${pad(date.getHours())}-${pad(date.getMinutes())}-${pad(date.getSeconds())}`
  );
}

function render(format: ExportFormat, records: readonly object[], filename: string): string {
  switch (format) {
    case 'csv':
      return toCsv(toRows(records));
    case 'html':
      return toHtml(toRows(records), filename);
    case 'json':
      return `${JSON.stringify(records, null, 2)}\n`;
    case 'xml':
      return toXml(toRows(records));
  }
}

/**
 * Writes `records` once per format to `<outputDir>/<format>/<filename>.<format>`
 * and returns the written paths. Nothing is written for an empty selection.
 */
export async function exportRecords(
  records: readonly object[],
  options: ExportOptions
): Promise<string[]> {
  const logger = options.logger ?? noopLogger;
  const formats = Array.from(new Set(options.formats));
  if (records.length === 0 || formats.length === 0) {
    logger.info('Nothing to export', { records: records.length, formats });
    return [];
  }

  const filename = options.filename ?? timestampFilename();
  const written: string[] = [];

  for (const format of formats) {
    const dir = path.join(options.outputDir, format);
    await fs.mkdir(dir, { recursive: true });

    const filePath = path.join(dir, `${filename}.${format}`);
    await fs.writeFile(filePath, render(format, records, filename), 'utf-8');
    logger.info('Exported records', { format, path: filePath, records: records.length });
    written.push(filePath);
  }

  return written;
}
