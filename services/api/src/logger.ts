type Meta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: Meta): void;
  info(message: string, meta?: Meta): void;
  warn(message: string, meta?: Meta): void;
  error(message: string, meta?: Meta): void;
  child(tag: string): Logger;
}

export interface LoggerOptions {
  silent?: boolean;
}

function emit(method: 'debug' | 'info' | 'warn' | 'error', prefix: string, message: string, meta?: Meta) {
  if (meta) {
    console[method](`${prefix} ${message}`, meta);
  } else {
    console[method](`${prefix} ${message}`);
  }
}

export function createLogger(tag: string, options: LoggerOptions = {}): Logger {
  const prefix = `[${tag}]`;
  const silent = options.silent ?? false;
  const log = (method: 'debug' | 'info' | 'warn' | 'error') => (message: string, meta?: Meta) => {
    if (!silent) emit(method, prefix, message, meta);
  };
  return {
    debug: log('debug'),
    info: log('info'),
    warn: log('warn'),
    error: log('error'),
    child: (childTag) => createLogger(childTag, options),
  };
}
