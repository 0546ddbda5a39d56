import { errorMessage } from "./errors";

export type LogSource = "express" | "sync" | "workflow" | "permissions" | "seed" | "db";

function timestamp(): string {
  return new Date().toLocaleTimeString("en-US", {
    hour: "numeric",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
  });
}

export function log(message: string, source: LogSource = "express") {
  console.log(`${timestamp()} [${source}] ${message}`);
}

export function logWarn(message: string, source: LogSource = "express") {
  console.warn(`${timestamp()} [${source}] ${message}`);
}

export function logError(message: string, error: unknown, source: LogSource = "express") {
  console.error(`${timestamp()} [${source}] ${message}: ${errorMessage(error)}`);
  if (error instanceof Error && error.stack && process.env.NODE_ENV !== "production") {
    console.error(error.stack);
  }
}
