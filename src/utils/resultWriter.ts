/**
 * CSV writer for classified rows
 */

import * as fs from 'fs';
import { once } from 'events';
import { dirname } from 'path';
import { finished } from 'stream/promises';
import * as Papa from 'papaparse';
import { OutputRow } from '../types/email';

export const OUTPUT_COLUMNS = ['email', 'domain', 'registration_alive', 'mail_exchange_exists'];

export class ResultWriter {
  private rows = 0;
  private failure: Error | null = null;

  private constructor(private readonly stream: fs.WriteStream) {
    stream.on('error', error => {
      this.failure = this.failure ?? error;
    });
  }

  /**
   * Create (or truncate) the output file and write the header row.
   * Rejects if the file cannot be opened.
   */
  static async open(filePath: string): Promise<ResultWriter> {
    await fs.promises.mkdir(dirname(filePath), { recursive: true });

    const stream = fs.createWriteStream(filePath, { encoding: 'utf-8' });
    const writer = new ResultWriter(stream);
    await once(stream, 'open');

    writer.writeLine(OUTPUT_COLUMNS);
    return writer;
  }

  get rowsWritten(): number {
    return this.rows;
  }

  /**
   * @throws the stream error if an earlier write failed
   */
  write(row: OutputRow): void {
    this.writeLine([
      row.email,
      row.domain,
      row.registrationAlive ? '1' : '0',
      row.mailExchangeExists ? '1' : '0',
    ]);
    this.rows++;
  }

  /**
   * Flush and close. Rejects with the first stream error, if any.
   */
  async close(): Promise<void> {
    if (this.failure) {
      throw this.failure;
    }
    this.stream.end();
    await finished(this.stream);
  }

  private writeLine(values: string[]): void {
    if (this.failure) {
      throw this.failure;
    }
    this.stream.write(`${Papa.unparse([values], { newline: '\n' })}\n`);
  }
}
