import { open } from 'node:fs/promises';
import Papa from 'papaparse';
import type { OutputRecord } from '../../domain/model/Outcome.js';
import type { ResultSink } from '../../domain/ports/ResultSink.js';

/** Serialise records as `sequence,identifier,result` lines, each ending in `\n`. */
export function formatRecords(records: readonly OutputRecord[]): string {
  if (records.length === 0) return '';
  const rows = records.map((record) => [String(record.sequence), record.identifier, record.result]);
  return Papa.unparse(rows, { newline: '\n' }) + '\n';
}

/**
 * Append-only CSV output.
 *
 * Every `flush()` opens the file in append mode, writes the whole group and
 * closes the handle, also when the write fails or there is nothing to write.
 * Fields containing commas, quotes or line breaks are quoted.
 *
 * Node.js only.
 */
export class CsvFileSink implements ResultSink {
  constructor(private readonly filePath: string) {}

  async flush(records: readonly OutputRecord[]): Promise<void> {
    const handle = await open(this.filePath, 'a');
    try {
      const text = formatRecords(records);
      if (text !== '') {
        await handle.writeFile(text, 'utf-8');
      }
    } finally {
      await handle.close();
    }
  }

  get path(): string {
    return this.filePath;
  }
}
