import { isLogLevel, type LogLevel } from "@/lib/logger";
import { ConfigError } from "@/types/api";

const DEFAULT_BASE_URL = "/api-de-dados";
const DEFAULT_PAGE_LIMIT = 50;

export interface PortalConfig {
  /** Endpoint root; `/contratos` is appended. */
  baseUrl: string;
  /** Sent as the `chave-api-dados` header. */
  apiKey: string;
  pageLimit: number;
  /** Pause between successive page requests; 0 disables it. */
  pageDelayMs: number;
  logLevel: LogLevel;
}

type Env = Readonly<Record<string, unknown>>;

function readString(env: Env, key: string): string | undefined {
  const value = env[key];
  if (typeof value !== "string") return undefined;
  const trimmed = value.trim();
  return trimmed === "" ? undefined : trimmed;
}

function readInteger(env: Env, key: string, fallback: number, min: number): number {
  const raw = readString(env, key);
  if (raw === undefined) return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < min) {
    throw new ConfigError(key, `${key} deve ser um inteiro >= ${min} (recebido "${raw}").`);
  }
  return n;
}

/**
 * Builds the portal configuration from the Vite environment. Called once at
 * startup; the result is passed down explicitly.
 */
export function loadConfig(env: Env): PortalConfig {
  const apiKey = readString(env, "VITE_PORTAL_TRANSPARENCIA_TOKEN");
  if (!apiKey) {
    throw new ConfigError(
      "VITE_PORTAL_TRANSPARENCIA_TOKEN",
      "VITE_PORTAL_TRANSPARENCIA_TOKEN não definido (.env.local)",
    );
  }

  const logLevel = readString(env, "VITE_LOG_LEVEL") ?? "info";
  if (!isLogLevel(logLevel)) {
    throw new ConfigError("VITE_LOG_LEVEL", `VITE_LOG_LEVEL inválido: "${logLevel}".`);
  }

  const baseUrl = readString(env, "VITE_PORTAL_BASE_URL") ?? DEFAULT_BASE_URL;

  return {
    baseUrl: baseUrl.replace(/\/+$/, ""),
    apiKey,
    pageLimit: readInteger(env, "VITE_MAX_PAGINAS", DEFAULT_PAGE_LIMIT, 1),
    pageDelayMs: readInteger(env, "VITE_PAGE_DELAY_MS", 0, 0),
    logLevel,
  };
}
