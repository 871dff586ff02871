type LogLevel = 'info' | 'warn' | 'error';

export interface LogMeta {
  requestId?: string;
  sessionId?: string;
  [key: string]: unknown;
}

const writeLog = (level: LogLevel, message: string, meta: LogMeta = {}): void => {
  const line = JSON.stringify({
    ts: new Date().toISOString(),
    level,
    message,
    ...meta,
  });

  if (level === 'error') {
    console.error(line);
    return;
  }

  console.log(line);
};

export const describeError = (error: unknown): string => {
  return error instanceof Error ? error.message : String(error);
};

export const logger = {
  info: (message: string, meta?: LogMeta) => writeLog('info', message, meta),
  warn: (message: string, meta?: LogMeta) => writeLog('warn', message, meta),
  error: (message: string, meta?: LogMeta) => writeLog('error', message, meta),
};
