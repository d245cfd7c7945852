import { ConfigError } from "./errors";
import { type LogLevel, isLogLevel } from "./logger";

export type Env = {
  DEVICE_ID: string;
  DEVICE_CLASS: string;
  DEVICE_RESOURCE: string;
  DEVICE_NAME?: string;
  DEVICE_STATUS: number;
  AUTH_USER_ID: string;
  AUTH_TOKEN: string;
  AUTH_REALM: string;
  AUTH_RESOURCE: string;
  CONTINENT: string;
  COUNTRY: string;
  PORTAL_URL: string;
  MQTT_URL: string;
  LOG_LEVEL: LogLevel;
  COMMAND_CONCURRENCY: number;
  COMMAND_TIMEOUT_MS: number;
  LIFESPAN_POLL_INTERVAL_S: number;
};

export function portalUrl(continent: string, country: string): string {
  if (country.toLowerCase() === "cn") return "https://portal.ecouser.net/api";
  return `https://portal-${continent.toLowerCase()}.ecouser.net/api`;
}

function positiveNumber(key: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw === "") return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigError(`Invalid env ${key}: expected a positive number, got "${raw}"`);
  }
  return value;
}

function required(source: NodeJS.ProcessEnv, key: string): string {
  const value = source[key];
  if (!value) {
    throw new ConfigError(`Missing required env: ${key}`);
  }
  return value;
}

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const deviceResource = required(source, "DEVICE_RESOURCE");
  const continent = source.CONTINENT || "ww";
  const country = source.COUNTRY || "us";
  const logLevel = source.LOG_LEVEL || "info";
  if (!isLogLevel(logLevel)) {
    throw new ConfigError(`Invalid env LOG_LEVEL: "${logLevel}"`);
  }

  return {
    DEVICE_ID: required(source, "DEVICE_ID"),
    DEVICE_CLASS: required(source, "DEVICE_CLASS"),
    DEVICE_RESOURCE: deviceResource,
    DEVICE_NAME: source.DEVICE_NAME,
    DEVICE_STATUS: Number(source.DEVICE_STATUS || 1),
    AUTH_USER_ID: required(source, "AUTH_USER_ID"),
    AUTH_TOKEN: required(source, "AUTH_TOKEN"),
    AUTH_REALM: source.AUTH_REALM || "ecouser.net",
    AUTH_RESOURCE: source.AUTH_RESOURCE || deviceResource,
    CONTINENT: continent,
    COUNTRY: country,
    PORTAL_URL: source.PORTAL_URL || portalUrl(continent, country),
    MQTT_URL: source.MQTT_URL || `mqtts://mq-${continent.toLowerCase()}.ecouser.net:8883`,
    LOG_LEVEL: logLevel,
    COMMAND_CONCURRENCY: Math.floor(positiveNumber("COMMAND_CONCURRENCY", source.COMMAND_CONCURRENCY, 3)),
    COMMAND_TIMEOUT_MS: positiveNumber("COMMAND_TIMEOUT_MS", source.COMMAND_TIMEOUT_MS, 60000),
    LIFESPAN_POLL_INTERVAL_S: positiveNumber("LIFESPAN_POLL_INTERVAL_S", source.LIFESPAN_POLL_INTERVAL_S, 60),
  };
}
