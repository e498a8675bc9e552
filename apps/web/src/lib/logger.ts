type LogArgs = unknown[];

export const logger = {
  info: (...args: LogArgs) => {
    console.log(...args);
  },
  error: (...args: LogArgs) => {
    console.error(...args);
  },
  warn: (...args: LogArgs) => {
    console.warn(...args);
  },
  debug: (...args: LogArgs) => {
    console.debug(...args);
  },
};
