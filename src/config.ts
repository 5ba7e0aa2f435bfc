import path from "path";
import { z } from "zod";
import { AppError, ErrorKind } from "./errors.js";
import type { LevelWithSilent } from "pino";

export const DEFAULT_TIMEZONE = "America/Chicago";

const booleanFlag = z
  .string()
  .trim()
  .toLowerCase()
  .refine((value) => ["1", "0", "true", "false", "yes", "no", ""].includes(value), {
    message: "expected one of 1, 0, true, false, yes, no",
  })
  .transform((value) => value === "" || value === "1" || value === "true" || value === "yes");

const blankAsUnset = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const envSchema = z.object({
  CHAT_TIMEZONE: z.preprocess(blankAsUnset, z.string().trim().min(1).default(DEFAULT_TIMEZONE)),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  CHAT_OUTPUT_DIR: z.preprocess(blankAsUnset, z.string().trim().min(1).optional()),
  CHAT_OPEN_BROWSER: booleanFlag.default("1"),
});

export interface AppConfig {
  timeZone: string;
  logLevel: LevelWithSilent;
  outputDir: string;
  openBrowser: boolean;
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new AppError(ErrorKind.ENVIRONMENT, `Invalid configuration: ${issues}`);
  }

  const values = parsed.data;
  return {
    timeZone: values.CHAT_TIMEZONE,
    logLevel: values.LOG_LEVEL,
    outputDir: values.CHAT_OUTPUT_DIR ? path.resolve(cwd, values.CHAT_OUTPUT_DIR) : cwd,
    openBrowser: values.CHAT_OPEN_BROWSER,
  };
}
