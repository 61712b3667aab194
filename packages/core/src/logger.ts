export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  scope: string;
  message: string;
  data?: unknown;
}

export type LogTransport = (entry: LogEntry) => void;

export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let globalTransports: LogTransport[] = [];
let globalMinLevel: LogLevel = 'warn';

/** Add a transport that receives all log entries */
export function addLogTransport(transport: LogTransport): () => void {
  globalTransports.push(transport);
  return () => {
    globalTransports = globalTransports.filter((t) => t !== transport);
  };
}

/** Set the minimum log level (entries below this are dropped) */
export function setLogLevel(level: LogLevel): void {
  globalMinLevel = level;
}

export function getLogLevel(): LogLevel {
  return globalMinLevel;
}

export function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

/**
 * Console transport, the default. Everything goes to stderr because stdout
 * carries the event display.
 */
export function consoleTransport(entry: LogEntry): void {
  const prefix = `[${entry.scope}]`;
  const msg = entry.data !== undefined
    ? `${prefix} ${entry.message} ${JSON.stringify(entry.data)}`
    : `${prefix} ${entry.message}`;

  switch (entry.level) {
    case 'debug':
      process.stderr.write(`DEBUG ${msg}\n`);
      break;
    case 'info':
      process.stderr.write(`INFO ${msg}\n`);
      break;
    case 'warn':
      process.stderr.write(`WARN ${msg}\n`);
      break;
    case 'error':
      process.stderr.write(`ERROR ${msg}\n`);
      break;
  }
}

/** Redact API keys and tokens from log messages */
export function redactSecrets(message: string): string {
  return message.replace(
    /\b(sk-[a-zA-Z0-9_-]{10})[a-zA-Z0-9_-]{20,}/g,
    '$1****',
  );
}

function emit(entry: LogEntry): void {
  if (LOG_LEVELS[entry.level] < LOG_LEVELS[globalMinLevel]) return;
  const sanitized = { ...entry, message: redactSecrets(entry.message) };
  for (const transport of globalTransports) {
    try {
      transport(sanitized);
    } catch {
      // A failing transport must not break the caller
    }
  }
}

/**
 * Create a scoped logger. Each module creates one:
 *   const log = createLogger('EvolveEngine');
 *   log.info('Round started', { round });
 */
export function createLogger(scope: string): Logger {
  function log(level: LogLevel, message: string, data?: unknown): void {
    emit({
      timestamp: new Date().toISOString(),
      level,
      scope,
      message,
      data,
    });
  }

  return {
    debug: (message, data) => log('debug', message, data),
    info: (message, data) => log('info', message, data),
    warn: (message, data) => log('warn', message, data),
    error: (message, data) => log('error', message, data),
  };
}

// Register console transport by default
addLogTransport(consoleTransport);
