export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const levelOrder: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function resolveLevel(): LogLevel {
  const env = (process.env.LOG_LEVEL ?? 'info').toLowerCase();
  if (env === 'debug' || env === 'info' || env === 'warn' || env === 'error') return env;
  return 'info';
}

export type Logger = {
  debug: (msg: string) => void;
  info: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string) => void;
};

function fmt(scope: string, level: LogLevel, msg: string) {
  return `${new Date().toISOString()} ${level.toUpperCase().padEnd(5)} [${scope}] ${msg}`;
}

export function createLogger(scope: string): Logger {
  const should = (level: LogLevel) => levelOrder[level] >= levelOrder[resolveLevel()];

  return {
    debug: (msg) => { if (should('debug')) console.debug(fmt(scope, 'debug', msg)); },
    info: (msg) => { if (should('info')) console.log(fmt(scope, 'info', msg)); },
    warn: (msg) => { if (should('warn')) console.warn(fmt(scope, 'warn', msg)); },
    error: (msg) => { if (should('error')) console.error(fmt(scope, 'error', msg)); },
  };
}
