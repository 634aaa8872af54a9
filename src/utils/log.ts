// Console-backed loggers with a scope prefix. `debug` only prints when MISSION_DEBUG is set.

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

export function createLogger(scope: string, env: NodeJS.ProcessEnv = process.env): Logger {
  const prefix = `[${scope}]`;
  const debugEnabled = !!env.MISSION_DEBUG;
  return {
    debug: (...args) => { if (debugEnabled) console.debug(prefix, ...args); },
    info: (...args) => console.log(prefix, ...args),
    warn: (...args) => console.warn(prefix, ...args),
    error: (...args) => console.error(prefix, ...args),
  };
}
