import { DEFAULT_LOG_LEVEL, isLogLevel } from "@/lib/logger";
import type { LogLevel } from "@/lib/logger";
import type { TransportKind } from "@/types";
import type { Logger } from "pino";

const REQUIRED_ENV_VARS = [
  "HONEYBADGER_API_KEY",
  "HONEYBADGER_PROJECT_ID",
] as const;

const DEFAULT_TRANSPORT: TransportKind = "sse";
const DEFAULT_HOST = "127.0.0.1";
const DEFAULT_PORT = 8050;

/** Settings read once at start-up; frozen and never mutated afterwards */
export interface AppConfig {
  readonly apiKey: string;
  readonly projectId: string;
  readonly transport: TransportKind;
  readonly host: string;
  readonly port: number;
  readonly logLevel: LogLevel;
}

export function getRequiredEnv(name: string): string {
  const value = process.env[name];
  if (!value) {
    throw new Error(`Required environment variable ${name} is not set`);
  }
  return value;
}

function missingEnvVarsMessage(): string | null {
  const missing = REQUIRED_ENV_VARS.filter((name) => !process.env[name]);
  if (missing.length === 0) return null;
  return `Missing required environment variables: ${missing.join(", ")}`;
}

export function validateRequiredEnvVars(): void {
  const message = missingEnvVarsMessage();
  if (message) {
    throw new Error(message);
  }
}

type ParseResult<T> = { ok: true; value: T } | { ok: false; message: string };

function parseTransport(raw: string | undefined): ParseResult<TransportKind> {
  if (!raw) return { ok: true, value: DEFAULT_TRANSPORT };
  if (raw === "stdio" || raw === "sse") return { ok: true, value: raw };
  return { ok: false, message: `Invalid TRANSPORT "${raw}": expected "stdio" or "sse"` };
}

function parsePort(raw: string | undefined): ParseResult<number> {
  if (!raw) return { ok: true, value: DEFAULT_PORT };
  const port = Number(raw);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    return { ok: false, message: `Invalid PORT "${raw}": expected an integer between 1 and 65535` };
  }
  return { ok: true, value: port };
}

function parseLogLevel(raw: string | undefined): ParseResult<LogLevel> {
  if (!raw) return { ok: true, value: DEFAULT_LOG_LEVEL };
  if (isLogLevel(raw)) return { ok: true, value: raw };
  return { ok: false, message: `Invalid LOG_LEVEL "${raw}": expected debug, info, warn, error or fatal` };
}

/**
 * Read and validate every setting. All problems are reported together,
 * joined with "; ", so one restart is enough to fix a bad environment.
 */
export function loadConfig(): AppConfig {
  const transport = parseTransport(process.env.TRANSPORT);
  const port = parsePort(process.env.PORT);
  const logLevel = parseLogLevel(process.env.LOG_LEVEL);

  const problems: string[] = [];
  const missing = missingEnvVarsMessage();
  if (missing) problems.push(missing);
  for (const result of [transport, port, logLevel]) {
    if (!result.ok) problems.push(result.message);
  }
  if (missing || !transport.ok || !port.ok || !logLevel.ok) {
    throw new Error(problems.join("; "));
  }

  return Object.freeze({
    apiKey: getRequiredEnv("HONEYBADGER_API_KEY"),
    projectId: getRequiredEnv("HONEYBADGER_PROJECT_ID"),
    transport: transport.value,
    host: process.env.HOST || DEFAULT_HOST,
    port: port.value,
    logLevel: logLevel.value,
  });
}

/** Start-up wrapper: logs a fatal `config_invalid` entry and exits 1 on bad config */
export function loadConfigOrExit(log: Logger): AppConfig {
  try {
    return loadConfig();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    log.fatal({ action: "config_invalid" }, message);
    process.exit(1);
  }
}
