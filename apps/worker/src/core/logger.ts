import pino from "pino";

export interface LoggerLike {
  info(payload: unknown, message?: string): void;
  warn(payload: unknown, message?: string): void;
  error(payload: unknown, message?: string): void;
}

export function createLogger(level: string, name = "energy-pipeline-worker") {
  return pino({ name, level });
}

export const silentLogger: LoggerLike = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined
};
