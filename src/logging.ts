import { pino, type LevelWithSilent } from "pino";

export interface ILogger {
  debug(obj: object, msg?: string): void;
  info(obj: object, msg?: string): void;
  warn(obj: object, msg?: string): void;
  error(obj: object, msg?: string): void;
}

export const makeLogger = (
  level: LevelWithSilent = "info",
  pretty = false,
): ILogger =>
  pino({
    name: "todo-ledger",
    level,
    ...(pretty
      ? {
          transport: {
            target: "pino-pretty",
            options: { colorize: true, translateTime: "HH:MM:ss.l" },
          },
        }
      : {}),
  });
