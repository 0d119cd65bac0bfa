/**
 * Address sources for batch runs: CSV with a header row, or plain text with
 * one address per line.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as readline from 'readline';
import csvParser from 'csv-parser';

export const SUPPORTED_EXTENSIONS = ['.csv', '.txt'] as const;

export type InputExtension = typeof SUPPORTED_EXTENSIONS[number];

export class UnsupportedInputError extends Error {
  constructor(public readonly filePath: string) {
    super(`Input file must be one of ${SUPPORTED_EXTENSIONS.join(', ')} (got: "${filePath}")`);
    this.name = 'UnsupportedInputError';
  }
}

function isInputExtension(ext: string): ext is InputExtension {
  return SUPPORTED_EXTENSIONS.some(supported => supported === ext);
}

/**
 * Check the input file extension before any processing starts
 *
 * @throws UnsupportedInputError for anything but .csv or .txt
 */
export function assertSupportedInput(filePath: string): InputExtension {
  const ext = path.extname(filePath).toLowerCase();

  if (!isInputExtension(ext)) {
    throw new UnsupportedInputError(filePath);
  }

  return ext;
}

async function* readCsvEmails(filePath: string): AsyncGenerator<string> {
  const source = fs.createReadStream(filePath, { encoding: 'utf-8' });
  const rows = source.pipe(csvParser({ mapHeaders: ({ header }) => header.trim() }));

  source.on('error', error => rows.destroy(error));

  for await (const row of rows) {
    const record: Record<string, string | undefined> = row;

    // Prefer an "email" column, fall back to the first column
    const email = 'email' in record ? record.email : Object.values(record)[0];

    yield (email ?? '').trim();
  }
}

async function* readTextEmails(filePath: string): AsyncGenerator<string> {
  const input = fs.createReadStream(filePath, { encoding: 'utf-8' });
  const lines = readline.createInterface({ input, crlfDelay: Infinity });

  let failure: Error | undefined;
  input.on('error', error => {
    failure = error;
    lines.close();
  });

  for await (const line of lines) {
    yield line.trim();
  }

  if (failure) {
    throw failure;
  }
}

/**
 * Stream candidate addresses from a .csv or .txt file, trimmed.
 * Values are not validated here.
 */
export function readEmails(filePath: string): AsyncGenerator<string> {
  return assertSupportedInput(filePath) === '.csv'
    ? readCsvEmails(filePath)
    : readTextEmails(filePath);
}
