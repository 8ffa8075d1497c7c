import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { log } from '../utils/logger';
import { Lead } from './types';

const pad = (value: number): string => String(value).padStart(2, '0');

/** `leads_YYYYMMDD_HHMMSS.json`, local time. */
export const leadsFileName = (date: Date): string => {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `leads_${day}_${time}.json`;
};

export const writeLeadsFile = async (
  leads: readonly Readonly<Lead>[],
  outputDir: string,
  date: Date = new Date(),
): Promise<string> => {
  await mkdir(outputDir, { recursive: true });
  const file = join(outputDir, leadsFileName(date));
  await writeFile(file, `${JSON.stringify(leads, null, 2)}\n`, 'utf8');
  log('INFO', `saved ${leads.length} leads`, { file });
  return file;
};
