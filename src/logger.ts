/**
 * Diagnostics sink used by the file layer and the CLI.
 *
 * The scanner and extractor never log; callers pass a Logger to whatever
 * performs I/O on their behalf.
 */
export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/** Progress and notices on stdout, failures on stderr. */
export const consoleLogger: Logger = {
  info: message => console.log(message),
  warn: message => console.log(message),
  error: message => console.error(message),
};

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};
