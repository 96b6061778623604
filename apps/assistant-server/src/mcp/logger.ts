import { createLogger, type Logger, type LoggerOptions, type LogSink } from '../logging';

// stdout carries the protocol, so logs go to stderr.
export const stderrSink: LogSink = (_level, line) => {
  process.stderr.write(`${line}\n`);
};

export function createMcpLogger(bindings?: Record<string, unknown>, options: Omit<LoggerOptions, 'sink'> = {}): Logger {
  return createLogger(bindings, { ...options, sink: stderrSink });
}
