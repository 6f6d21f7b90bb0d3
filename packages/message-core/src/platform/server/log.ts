type LogFn = (...args: unknown[]) => void;

export type Logger = {
  log: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
  debug: LogFn;
};

export const logger: Logger = {
  log: (...args) => console.log(...args),
  info: (...args) => console.info(...args),
  warn: (...args) => console.warn(...args),
  error: (...args) => console.error(...args),
  debug: (...args) => {
    if (process.env.DEBUG) {
      console.debug(...args);
    }
  },
};
