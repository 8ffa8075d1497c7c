export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

const debugEnabled = (): boolean => (process.env.LOG_LEVEL || '').toLowerCase() === 'debug';

export const log = (level: LogLevel, msg: string, meta?: unknown): void => {
  if (level === 'DEBUG' && !debugEnabled()) return;
  const stamp = new Date().toISOString();
  const write = level === 'ERROR' ? console.error : console.log;
  if (meta !== undefined) {
    write(`[${stamp}] [${level}] ${msg}`, meta);
  } else {
    write(`[${stamp}] [${level}] ${msg}`);
  }
};
