/**
 * Step Logger
 *
 * Console logging in the `[elapsed] [STEP] message` shape used by the CLI.
 * info/debug go to stdout, warn/error to stderr. debug lines are dropped
 * unless the logger is verbose.
 */

export interface StepLogger {
  info(step: string, msg: string): void;
  warn(step: string, msg: string): void;
  error(step: string, msg: string): void;
  debug(step: string, msg: string): void;
}

export interface StepLoggerOptions {
  verbose?: boolean;
  /** Clock override for deterministic output. */
  now?: () => number;
}

export function createStepLogger(options: StepLoggerOptions = {}): StepLogger {
  const now = options.now ?? Date.now;
  const startTime = now();

  function line(step: string, msg: string): string {
    const elapsed = ((now() - startTime) / 1000).toFixed(1);
    return `  [${elapsed}s] [${step}] ${msg}`;
  }

  return {
    info: (step, msg) => console.log(line(step, msg)),
    warn: (step, msg) => console.warn(line(step, `WARN ${msg}`)),
    error: (step, msg) => console.error(line(step, `ERROR ${msg}`)),
    debug: (step, msg) => {
      if (options.verbose) console.log(line(step, msg));
    },
  };
}

/** A logger that discards everything. */
export const silentLogger: StepLogger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
};

export interface RecordedLine {
  level: "info" | "warn" | "error" | "debug";
  step: string;
  msg: string;
}

/** A logger that keeps lines in memory; used to assert on warnings. */
export function createRecordingLogger(): StepLogger & { lines: RecordedLine[] } {
  const lines: RecordedLine[] = [];
  return {
    lines,
    info: (step, msg) => lines.push({ level: "info", step, msg }),
    warn: (step, msg) => lines.push({ level: "warn", step, msg }),
    error: (step, msg) => lines.push({ level: "error", step, msg }),
    debug: (step, msg) => lines.push({ level: "debug", step, msg }),
  };
}
