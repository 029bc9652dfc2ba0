import path from "node:path";
import pino from "pino";

export const LOG_FILE = "domesday.log";

type LogEnv = Partial<Record<"LOG_LEVEL" | "LOG_DIR", string>>;

export function logLevel(env: LogEnv = process.env): string {
  return env.LOG_LEVEL?.trim() || "info";
}

/** Pretty lines on stderr, since `export` may write CSV to stdout; JSON lines under LOG_DIR. */
export function logTargets(env: LogEnv = process.env): pino.TransportTargetOptions[] {
  const level = logLevel(env);
  const dir = env.LOG_DIR?.trim() || path.join(process.cwd(), "logs");
  return [
    {
      target: "pino-pretty",
      level,
      options: { destination: 2, colorize: true, translateTime: "SYS:standard" },
    },
    {
      target: "pino/file",
      level,
      options: { destination: path.join(dir, LOG_FILE), mkdir: true },
    },
  ];
}

export const logger = pino(
  {
    level: logLevel(),
    base: undefined,
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  pino.transport({ targets: logTargets() })
);
