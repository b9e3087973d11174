import dotenv from "dotenv";

dotenv.config();

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

const logLevels: readonly LogLevel[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

function isLogLevel(value: string): value is LogLevel {
  return logLevels.some((level) => level === value);
}

export function parseLogLevel(value: string | undefined, fallback: LogLevel): LogLevel {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : fallback;
}

export function parseString(value: string | undefined, fallback: string): string {
  if (!value || value.trim().length === 0) {
    return fallback;
  }
  return value.trim();
}

export const config = {
  serviceName: parseString(process.env.SERVICE_NAME, "binary-separation"),
  logLevel: parseLogLevel(process.env.LOG_LEVEL, "info")
};
