export type LogFn = (message: string) => void;

export interface Logger {
  warn: LogFn;
  error: LogFn;
}

const PREFIX = '[scene-census]';

export const defaultLogger: Logger = {
  warn: (message) => console.warn(`${PREFIX} ${message}`),
  error: (message) => console.error(`${PREFIX} ${message}`),
};
