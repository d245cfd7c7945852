import dotenv from "dotenv";
dotenv.config();

import { CloudApiClient } from "./api/client";
import { VacuumBot } from "./bot/vacuumBot";
import { MqttClient } from "./mqtt/client";
import type { RequestAuth, Vacuum } from "./types";
import { loadEnv } from "./utils/env";
import { createLogger } from "./utils/logger";

async function main() {
  const env = loadEnv();
  const logger = createLogger(env.LOG_LEVEL);

  const vacuum: Vacuum = {
    did: env.DEVICE_ID,
    class: env.DEVICE_CLASS,
    resource: env.DEVICE_RESOURCE,
    name: env.DEVICE_NAME,
    status: env.DEVICE_STATUS,
  };
  const auth: RequestAuth = {
    userId: env.AUTH_USER_ID,
    realm: env.AUTH_REALM,
    token: env.AUTH_TOKEN,
    resource: env.AUTH_RESOURCE,
  };

  const api = new CloudApiClient(
    { portalUrl: env.PORTAL_URL, auth, timeoutMs: env.COMMAND_TIMEOUT_MS },
    logger
  );
  const bot = new VacuumBot(vacuum, {
    transport: api,
    logger,
    concurrency: env.COMMAND_CONCURRENCY,
    lifeSpanPollIntervalSeconds: env.LIFESPAN_POLL_INTERVAL_S,
  });
  const mqtt = new MqttClient({ url: env.MQTT_URL, auth }, logger);
  mqtt.subscribe(bot);

  const { events } = bot;
  events.status.subscribe((event) => logger.info("Status", { ...event }));
  events.battery.subscribe((event) => logger.info("Battery", { ...event }));
  events.error.subscribe((event) => logger.info("Error", { ...event }));
  events.fanSpeed.subscribe((event) => logger.info("Fan speed", { ...event }));
  events.waterInfo.subscribe((event) => logger.info("Water info", { ...event }));
  events.lifeSpan.subscribe((event) => logger.info("Life span", { ...event.lifespan }));
  events.stats.subscribe((event) => logger.info("Stats", { ...event }));
  events.cleanLogs.subscribe((event) => logger.info("Clean logs", { count: event.logs.length }));
  events.map.subscribe((event) => logger.debug("Map", { name: event.name }));
  for (const emitter of Object.values(events)) {
    emitter.requestRefresh();
  }

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    logger.info(`Received ${signal}, shutting down...`);
    bot.dispose();
    await mqtt.close();
    process.exit(0);
  };

  const onSignal = (signal: string) =>
    shutdown(signal).catch((err) => logger.error("Shutdown failed", { message: String(err) }));
  process.on("SIGINT", () => onSignal("SIGINT"));
  process.on("SIGTERM", () => onSignal("SIGTERM"));
  logger.info("Bot started", { did: vacuum.did });
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error(err);
  process.exit(1);
});
