/**
 * CSV export of metrics records
 */

import * as fs from 'fs';
import * as path from 'path';
import { MetricsRecord } from '../benchmarks/benchmark-types';

/**
 * Quotes a field when it contains a delimiter, quote or line break
 */
export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Serializes records as CSV with the columns
 * `Method,Threads,Time[,<resultLabel>],Speedup,Efficiency`.
 *
 * Numbers are written at full precision; the record order is preserved.
 */
export function formatResultsCsv(records: readonly MetricsRecord[], resultLabel?: string): string {
  const header = ['Method', 'Threads', 'Time'];
  if (resultLabel) {
    header.push(resultLabel);
  }
  header.push('Speedup', 'Efficiency');

  const rows = records.map(record => {
    const fields = [record.method, String(record.threadCount), String(record.meanElapsedSeconds)];
    if (resultLabel) {
      fields.push(record.meanResultValue !== undefined ? String(record.meanResultValue) : '');
    }
    fields.push(String(record.speedup), String(record.efficiency));
    return fields.map(escapeCsvField).join(',');
  });

  return [header.map(escapeCsvField).join(','), ...rows].join('\n') + '\n';
}

/**
 * Writes records to a CSV file, creating the parent directory if needed
 *
 * @returns Absolute path of the written file
 */
export async function writeResultsCsv(
  filePath: string,
  records: readonly MetricsRecord[],
  resultLabel?: string
): Promise<string> {
  const absolute = path.resolve(filePath);
  await fs.promises.mkdir(path.dirname(absolute), { recursive: true });
  await fs.promises.writeFile(absolute, formatResultsCsv(records, resultLabel), 'utf-8');
  return absolute;
}
