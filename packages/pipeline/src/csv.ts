// packages/pipeline/src/csv.ts
// Minimal-quoting CSV writer (comma, double quote, CRLF line ends).
import fs from 'node:fs';
import { once } from 'node:events';
import { finished } from 'node:stream/promises';
import { FloatValue } from '@featflat/core';
import type { CellValue } from '@featflat/core';

const NEEDS_QUOTES = /[",\r\n]/;
const EOL = '\r\n';

// integral floats keep a decimal point (17408.0) up to where exponent form starts
function formatFloat(n: number): string {
  return Number.isInteger(n) && Math.abs(n) < 1e16 ? n.toFixed(1) : String(n);
}

export function formatCell(v: CellValue): string {
  if (v === null) return '';
  if (v instanceof FloatValue) return formatFloat(v.value);
  if (typeof v === 'boolean') return v ? 'True' : 'False';
  if (typeof v === 'number') return String(v);
  return NEEDS_QUOTES.test(v) ? `"${v.replace(/"/g, '""')}"` : v;
}

export function formatRow(cells: readonly CellValue[]): string {
  // a lone empty cell is quoted so the row does not read back as a blank line
  if (cells.length === 1 && formatCell(cells[0]) === '') return '""' + EOL;
  return cells.map(formatCell).join(',') + EOL;
}

export class CsvWriter {
  private failure: Error | null = null;
  private done = false;

  private constructor(readonly path: string, private readonly stream: fs.WriteStream) {
    stream.on('error', (err) => { this.failure ??= err; });
  }

  /**
   * Creates the file exclusively (fails with EEXIST if it is already there)
   * and writes the header line.
   */
  static async open(path: string, header: readonly string[]): Promise<CsvWriter> {
    const stream = fs.createWriteStream(path, { flags: 'wx', encoding: 'utf-8' });
    await once(stream, 'open');
    const writer = new CsvWriter(path, stream);
    await writer.writeRow(header);
    return writer;
  }

  async writeRow(cells: readonly CellValue[]): Promise<void> {
    if (this.failure) throw this.failure;
    if (this.done) throw new Error(`CSV writer for ${this.path} is closed`);
    if (!this.stream.write(formatRow(cells))) await once(this.stream, 'drain');
  }

  async close(): Promise<void> {
    if (this.done) return;
    this.done = true;
    this.stream.end();
    await finished(this.stream);
    if (this.failure) throw this.failure;
  }

  /** Stops writing and removes the partial file. */
  async abort(): Promise<void> {
    this.done = true;
    if (!this.stream.destroyed) {
      this.stream.destroy();
      await once(this.stream, 'close');
    }
    await fs.promises.rm(this.path, { force: true });
  }
}
