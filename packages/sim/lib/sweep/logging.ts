/**
 * Logging sink.
 *
 * The core only ever needs "log this diagnostic line"; where it ends up is the caller's business.
 */

export type LogSink = (message: string) => void;

export const consoleLogSink: LogSink = message => console.warn(message);

// Discards everything (benchmarks, quiet CLI runs)
export const silentLogSink: LogSink = () => undefined;
