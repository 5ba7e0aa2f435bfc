import { pino, type LevelWithSilent } from "pino";

const LEVELS: readonly LevelWithSilent[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
];

export function isLogLevel(value: string | undefined): value is LevelWithSilent {
  return LEVELS.some((level) => level === value);
}

const envLevel = process.env.LOG_LEVEL;

// stdout is reserved for command results, so log lines go to stderr.
export const log = pino(
  {
    name: "chatlog-viewer",
    level: isLogLevel(envLevel) ? envLevel : "info",
    base: undefined,
  },
  pino.destination({ dest: 2, sync: true }),
);

export function setLogLevel(level: LevelWithSilent): void {
  log.level = level;
}
