import pc from "picocolors";

/** Receives one line per pipeline stage plus warnings for recoverable conditions. */
export interface BuildLogger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export const consoleLogger: BuildLogger = {
  info: (message: string): void => {
    console.log(message);
  },
  warn: (message: string): void => {
    console.warn(pc.yellow(message));
  },
  error: (message: string): void => {
    console.error(pc.red(message));
  },
};

export const silentLogger: BuildLogger = {
  info: (): void => {},
  warn: (): void => {},
  error: (): void => {},
};
