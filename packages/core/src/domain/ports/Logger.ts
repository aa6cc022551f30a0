/** Structured context attached to a log line. */
export type LogContext = Readonly<Record<string, unknown>>;

/**
 * Port for diagnostic output.
 *
 * Inject an implementation through the orchestrator or worker config to route
 * messages into the host application's logger. Defaults to `consoleLogger`.
 */
export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}
