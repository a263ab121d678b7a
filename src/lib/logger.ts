import pino from "pino";
import type { DestinationStream, Logger } from "pino";

export type LogLevel = "debug" | "info" | "warn" | "error" | "fatal";

export const DEFAULT_LOG_LEVEL: LogLevel = "info";

const validLevels: readonly LogLevel[] = ["debug", "info", "warn", "error", "fatal"];

export function isLogLevel(value: string): value is LogLevel {
  return validLevels.some((l) => l === value);
}

const envLevel = process.env.LOG_LEVEL;
const level: LogLevel = envLevel && isLogLevel(envLevel) ? envLevel : DEFAULT_LOG_LEVEL;

function createPinoOptions(
  logLevel: LogLevel = level,
): pino.LoggerOptions {
  return {
    level: logLevel,
    timestamp: pino.stdTimeFunctions.isoTime,
    messageKey: "message",
    formatters: {
      level(label) {
        return { level: label };
      },
    },
  };
}

// stdout belongs to the stdio transport, so every log line goes to stderr
function getTransport(): pino.TransportSingleOptions | undefined {
  const env = process.env.NODE_ENV;
  if (env !== "production" && env !== "test") {
    return {
      target: "pino-pretty",
      options: { colorize: true, destination: 2 },
    };
  }
  return undefined;
}

const transport = getTransport();
export const logger: Logger = pino(
  createPinoOptions(),
  transport ? pino.transport(transport) : pino.destination(2),
);

export function createToolLogger(tool: string): Logger {
  return logger.child({ tool });
}

/** Test helper: create a logger writing to a custom destination */
export function createLoggerWithDestination(
  destination: DestinationStream,
  logLevel?: LogLevel,
): Logger {
  return pino(createPinoOptions(logLevel), destination);
}
