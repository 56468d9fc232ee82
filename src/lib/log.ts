export type Logger = {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
};

export type LogSink = {
  out(line: string): void;
  err(line: string): void;
};

const consoleSink: LogSink = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

export function createLogger(sink: LogSink = consoleSink): Logger {
  return {
    info: (s) => sink.out(`[INFO] ${s}`),
    warn: (s) => sink.out(`[WARN] ${s}`),
    error: (s) => sink.err(`[ERROR] ${s}`),
  };
}

/** Collects log lines in memory instead of printing them. */
export function memoryLogger(): Logger & { lines: string[] } {
  const lines: string[] = [];
  const logger = createLogger({ out: (l) => lines.push(l), err: (l) => lines.push(l) });
  return { ...logger, lines };
}
