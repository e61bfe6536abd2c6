export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

type Fields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: Fields): void;
  info(message: string, fields?: Fields): void;
  warn(message: string, fields?: Fields): void;
  error(message: string, fields?: Fields): void;
}

const RANK: Record<LogLevel | 'silent', number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

function isLevel(value: string): value is keyof typeof RANK {
  return Object.prototype.hasOwnProperty.call(RANK, value);
}

function threshold(): number {
  const raw = (process.env.LOG_LEVEL ?? 'info').toLowerCase();
  return isLevel(raw) ? RANK[raw] : RANK.info;
}

// One JSON object per line, e.g. {"level":"info","scope":"monitor","message":"monitor_finished",...}
export function createLogger(scope: string): Logger {
  const write = (level: LogLevel, message: string, fields?: Fields) => {
    if (RANK[level] < threshold()) return;
    const line = JSON.stringify({ level, scope, message, time: new Date().toISOString(), ...fields });
    if (level === 'error') console.error(line);
    else if (level === 'warn') console.warn(line);
    else console.log(line);
  };

  return {
    debug: (message, fields) => write('debug', message, fields),
    info: (message, fields) => write('info', message, fields),
    warn: (message, fields) => write('warn', message, fields),
    error: (message, fields) => write('error', message, fields)
  };
}
