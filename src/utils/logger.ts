interface LogMeta {
  [key: string]: unknown;
}

type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

export interface Logger {
  debug: (message: string, meta?: LogMeta) => void;
  info: (message: string, meta?: LogMeta) => void;
  warn: (message: string, meta?: LogMeta) => void;
  error: (message: string, meta?: LogMeta) => void;
  child: (scope: string) => Logger;
}

const debugEnabled = process.env.LOG_DEBUG === '1' || process.env.LOG_DEBUG === 'true';

function write(level: LogLevel, scope: string | undefined, message: string, meta?: LogMeta): void {
  if (level === 'DEBUG' && !debugEnabled) {
    return;
  }

  const payload = {
    ts: new Date().toISOString(),
    level,
    ...(scope ? { scope } : {}),
    message,
    ...(meta ?? {})
  };

  if (level === 'ERROR') {
    console.error(JSON.stringify(payload));
    return;
  }

  console.log(JSON.stringify(payload));
}

function createLogger(scope?: string): Logger {
  return {
    debug: (message, meta) => write('DEBUG', scope, message, meta),
    info: (message, meta) => write('INFO', scope, message, meta),
    warn: (message, meta) => write('WARN', scope, message, meta),
    error: (message, meta) => write('ERROR', scope, message, meta),
    child: (childScope) => createLogger(scope ? `${scope}.${childScope}` : childScope)
  };
}

export const logger = createLogger();
