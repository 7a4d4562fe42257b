// ═══════════════════════════════════════════════════════════════
//  Logging — scoped, level-gated console output
// ═══════════════════════════════════════════════════════════════

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

let currentLevel: LogLevel = 'warn';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export interface Logger {
  debug(msg: string): void;
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
}

export function createLogger(scope: string): Logger {
  const emit = (level: Exclude<LogLevel, 'silent'>, msg: string): void => {
    if (RANK[level] < RANK[currentLevel]) return;
    console[level](`[${scope}] ${msg}`);
  };
  return {
    debug: msg => emit('debug', msg),
    info:  msg => emit('info', msg),
    warn:  msg => emit('warn', msg),
    error: msg => emit('error', msg),
  };
}
