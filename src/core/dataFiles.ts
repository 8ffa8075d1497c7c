import { readFileSync } from 'node:fs';
import { join } from 'node:path';

const DATA_DIR = join(__dirname, '..', '..', 'data');

export class DataFileError extends Error {
  constructor(file: string, message: string) {
    super(`${file}: ${message}`);
    this.name = 'DataFileError';
  }
}

export const readDataFile = (file: string): unknown => JSON.parse(readFileSync(join(DATA_DIR, file), 'utf8'));
