/** Structural subset of pino's Logger that modules depend on, so tests can pass plain mocks. */
export type LoggerLike = {
  info(obj: unknown, msg?: string): void;
  warn(obj: unknown, msg?: string): void;
  error(obj: unknown, msg?: string): void;
  debug?(obj: unknown, msg?: string): void;
};
