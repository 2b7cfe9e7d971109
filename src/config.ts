import { object, optional, picklist, safeParse } from "valibot";
import type { LevelWithSilent } from "pino";
import { ConfigError } from "./errors";
import type { ViewStrategy } from "./core/view";

const LOG_LEVELS = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
] as const satisfies readonly LevelWithSilent[];

const STRATEGIES = ["incremental", "snapshot"] as const satisfies readonly ViewStrategy[];

const envSchema = object({
  LOG_LEVEL: optional(picklist(LOG_LEVELS), "info"),
  LOG_PRETTY: optional(picklist(["true", "false", "1", "0"]), "false"),
  TODO_VIEW_STRATEGY: optional(picklist(STRATEGIES), "incremental"),
});

export interface Config {
  logLevel: LevelWithSilent;
  prettyLogs: boolean;
  strategy: ViewStrategy;
}

export const loadConfig = (
  env: Record<string, string | undefined> = process.env,
): Config => {
  const result = safeParse(envSchema, env);
  if (!result.success) {
    const [first] = result.issues;
    const key = first.path?.map((p) => String(p.key)).join(".") ?? "env";
    throw new ConfigError(`invalid ${key}: ${first.message}`);
  }
  const { LOG_LEVEL, LOG_PRETTY, TODO_VIEW_STRATEGY } = result.output;
  return {
    logLevel: LOG_LEVEL,
    prettyLogs: LOG_PRETTY === "true" || LOG_PRETTY === "1",
    strategy: TODO_VIEW_STRATEGY,
  };
};
