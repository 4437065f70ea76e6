import pino from "pino";
import { z } from "zod";

export type Logger = {
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
};

export const logLevelSchema = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

export type LogLevel = z.infer<typeof logLevelSchema>;

export function createLogger(level: LogLevel = "info"): pino.Logger {
  return pino({
    name: "convert",
    level: process.env.NODE_ENV === "test" ? "silent" : level
  });
}
