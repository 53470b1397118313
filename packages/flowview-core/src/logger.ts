export type ViewLogger = {
  debug(line: string): void;
  info(line: string): void;
  /** User-facing notices, e.g. the outcome of a command. */
  alert(line: string): void;
  error(line: string, context?: Record<string, unknown>): void;
};

export function createViewLogger(
  opts: {
    debug?: boolean;
    log?: (line: string) => void;
  } = {}
): ViewLogger {
  const debug = Boolean(opts.debug);
  const log = opts.log;
  return {
    debug: (line) => {
      if (!debug) return;
      if (log) log(line);
      else console.debug(line);
    },
    info: (line) => (log ? log(line) : console.info(line)),
    alert: (line) => (log ? log(line) : console.warn(line)),
    error: (line, context) => {
      if (log) log(context ? `${line} ${JSON.stringify(context)}` : line);
      else if (context) console.error(line, context);
      else console.error(line);
    },
  };
}

export const silentLogger: ViewLogger = {
  debug: () => {},
  info: () => {},
  alert: () => {},
  error: () => {},
};
