import { readFile } from 'fs/promises';
import path from 'path';

import { parse } from 'csv-parse/sync';

import { ConfigurationError } from '../analytics/errors.js';

import type { EventSource, RawEventTable } from './types.js';

function toRecords(parsed: unknown, sourceId: string): string[][] {
  if (!Array.isArray(parsed)) {
    throw new ConfigurationError('CSV export did not parse into rows', { sourceId });
  }
  return parsed.map((record: unknown) =>
    Array.isArray(record) ? record.map((cell: unknown) => (cell === undefined || cell === null ? '' : String(cell))) : []
  );
}

/**
 * Flat-file export of the failure-event table. The first line is the header.
 */
export class CsvEventSource implements EventSource {
  readonly id: string;
  private readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = path.resolve(filePath);
    this.id = `csv:${this.filePath}`;
  }

  async readTable(): Promise<RawEventTable> {
    const content = await readFile(this.filePath, 'utf-8');
    return parseCsvTable(content, this.id);
  }
}

export function parseCsvTable(content: string, sourceId = 'csv:inline'): RawEventTable {
  const records = toRecords(
    parse(content, {
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true,
      trim: true,
    }),
    sourceId
  );

  const [header, ...body] = records;
  const columns = (header ?? []).map((column) => column.trim().toLowerCase());

  const rows = body.map((record) => {
    const row: Record<string, unknown> = {};
    columns.forEach((column, i) => {
      const cell = record[i];
      row[column] = cell === undefined || cell === '' ? null : cell;
    });
    return row;
  });

  return { columns, rows };
}
