import { ConfigError } from "../errors";

export interface HarvestEnv {
  http: {
    timeoutMs: number;
    maxAttempts: number;
    backoffBaseMs: number;
    backoffMaxMs: number;
    userAgent: string;
    maxBytes: number;
    /** Uniform random pause of [d, 2d) after each successful request; 0 disables. */
    politenessDelayMs: number;
  };

  /** Cap on simultaneous outbound requests for a whole run. */
  maxConnections: number;
}

export const DEFAULT_USER_AGENT = "sdg-harvest/0.x (+publication metadata harvester)";

function parseIntEnv(
  name: string,
  value: string | undefined,
  defaultValue: number,
  min: number,
): number {
  if (value === undefined || value.trim().length === 0) return defaultValue;
  const raw = value.trim();
  if (!/^\d+$/.test(raw)) {
    throw new ConfigError(`Invalid integer env var: ${name}=${raw}`);
  }
  const parsed = Number.parseInt(raw, 10);
  if (parsed < min) {
    throw new ConfigError(`Env var ${name} must be >= ${min}, got ${parsed}`);
  }
  return parsed;
}

export function loadHarvestEnv(env: NodeJS.ProcessEnv = process.env): HarvestEnv {
  return {
    http: {
      timeoutMs: parseIntEnv("HTTP_TIMEOUT_MS", env.HTTP_TIMEOUT_MS, 30_000, 1),
      maxAttempts: parseIntEnv("HTTP_MAX_ATTEMPTS", env.HTTP_MAX_ATTEMPTS, 3, 1),
      backoffBaseMs: parseIntEnv("HTTP_BACKOFF_BASE_MS", env.HTTP_BACKOFF_BASE_MS, 500, 0),
      backoffMaxMs: parseIntEnv("HTTP_BACKOFF_MAX_MS", env.HTTP_BACKOFF_MAX_MS, 8_000, 0),
      userAgent: env.HTTP_USER_AGENT?.trim() || DEFAULT_USER_AGENT,
      maxBytes: parseIntEnv("HTTP_MAX_BYTES", env.HTTP_MAX_BYTES, 100 * 1024 * 1024, 1),
      politenessDelayMs: parseIntEnv("POLITENESS_DELAY_MS", env.POLITENESS_DELAY_MS, 0, 0),
    },
    maxConnections: parseIntEnv("MAX_CONNECTIONS", env.MAX_CONNECTIONS, 4, 1),
  };
}
