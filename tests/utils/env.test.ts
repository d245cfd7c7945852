import { describe, expect, it } from "vitest";
import { loadEnv, portalUrl } from "../../src/utils/env";
import { ConfigError } from "../../src/utils/errors";

const base = {
  DEVICE_ID: "did-1",
  DEVICE_CLASS: "cls-1",
  DEVICE_RESOURCE: "res-1",
  AUTH_USER_ID: "user-1",
  AUTH_TOKEN: "test-token",
};

describe("loadEnv", () => {
  it("applies defaults", () => {
    const env = loadEnv({ ...base });
    expect(env.PORTAL_URL).toBe("https://portal-ww.ecouser.net/api");
    expect(env.MQTT_URL).toBe("mqtts://mq-ww.ecouser.net:8883");
    expect(env.AUTH_RESOURCE).toBe("res-1");
    expect(env.AUTH_REALM).toBe("ecouser.net");
    expect(env.COMMAND_CONCURRENCY).toBe(3);
    expect(env.LIFESPAN_POLL_INTERVAL_S).toBe(60);
    expect(env.DEVICE_STATUS).toBe(1);
    expect(env.LOG_LEVEL).toBe("info");
  });

  it("reads overrides", () => {
    const env = loadEnv({ ...base, CONTINENT: "EU", COMMAND_CONCURRENCY: "5", LOG_LEVEL: "debug" });
    expect(env.PORTAL_URL).toBe("https://portal-eu.ecouser.net/api");
    expect(env.MQTT_URL).toBe("mqtts://mq-eu.ecouser.net:8883");
    expect(env.COMMAND_CONCURRENCY).toBe(5);
    expect(env.LOG_LEVEL).toBe("debug");
  });

  it("uses the China portal for cn", () => {
    expect(portalUrl("as", "CN")).toBe("https://portal.ecouser.net/api");
  });

  it("throws ConfigError for a missing required value", () => {
    const { DEVICE_ID: _omitted, ...rest } = base;
    expect(() => loadEnv(rest)).toThrow(ConfigError);
    expect(() => loadEnv(rest)).toThrow("Missing required env: DEVICE_ID");
  });

  it("rejects invalid numbers and levels", () => {
    expect(() => loadEnv({ ...base, COMMAND_CONCURRENCY: "abc" })).toThrow(
      'Invalid env COMMAND_CONCURRENCY: expected a positive number, got "abc"'
    );
    expect(() => loadEnv({ ...base, LOG_LEVEL: "loud" })).toThrow('Invalid env LOG_LEVEL: "loud"');
  });
});
