import mqtt, { type MqttClient as RawClient } from "mqtt";
import type { VacuumBot } from "../bot/vacuumBot";
import type { RequestAuth, Vacuum } from "../types";
import { isJsonObject } from "../utils/json";
import { type Logger, describeError } from "../utils/logger";

export type PushClientOptions = {
  url: string;
  auth: RequestAuth;
};

export function pushTopic(vacuum: Vacuum): string {
  return `iot/atr/+/${vacuum.did}/${vacuum.class}/${vacuum.resource}/j`;
}

/**
 * Receives pushed device events over MQTT and hands them to the bot that owns
 * the device. Topic layout: iot/atr/<event>/<did>/<class>/<resource>/j
 */
export class MqttClient {
  private client: RawClient;
  private logger: Logger;
  private bots: Map<string, VacuumBot> = new Map();

  constructor(options: PushClientOptions, logger: Logger) {
    this.logger = logger.child({ component: "mqtt" });
    const { auth } = options;
    this.logger.info("MQTT connecting", { url: options.url });

    this.client = mqtt.connect(options.url, {
      username: auth.userId,
      password: auth.token,
      clientId: `${auth.userId}@${auth.realm.split(".")[0]}/${auth.resource}`,
      reconnectPeriod: 2000,
    });

    this.client.on("connect", () => {
      this.logger.info("MQTT connected");
      for (const bot of this.bots.values()) {
        this.client.subscribe(pushTopic(bot.vacuum));
      }
    });

    this.client.on("reconnect", () => this.logger.debug("MQTT reconnecting"));
    this.client.on("close", () => this.logger.debug("MQTT close"));
    this.client.on("offline", () => this.logger.warn("MQTT offline"));
    this.client.on("error", (err) => this.logger.error("MQTT error", { message: err.message }));
    this.client.on("message", (topic, payload) => this.handleMessage(topic, payload));
  }

  subscribe(bot: VacuumBot): void {
    this.bots.set(bot.vacuum.did, bot);
    if (this.client.connected) {
      this.client.subscribe(pushTopic(bot.vacuum));
    }
  }

  unsubscribe(bot: VacuumBot): void {
    if (!this.bots.delete(bot.vacuum.did)) return;
    if (this.client.connected) {
      this.client.unsubscribe(pushTopic(bot.vacuum));
    }
  }

  async close(): Promise<void> {
    this.logger.info("Closing MQTT client");
    this.bots.clear();
    this.client.end();
  }

  private handleMessage(topic: string, payload: Buffer): void {
    const parts = topic.split("/");
    if (parts.length < 7 || parts[0] !== "iot" || parts[1] !== "atr") {
      this.logger.debug("Ignoring message on unexpected topic", { topic });
      return;
    }
    const eventName = parts[2];
    const bot = this.bots.get(parts[3]);
    if (!bot) {
      this.logger.debug("Message for unknown device", { topic });
      return;
    }

    let data: unknown;
    try {
      data = JSON.parse(payload.toString());
    } catch (err) {
      this.logger.error("Failed to parse push payload", { topic, message: describeError(err) });
      return;
    }
    if (!isJsonObject(data)) {
      this.logger.warn("Push payload is not an object", { topic });
      return;
    }

    this.logger.debug("MQTT message", { event: eventName, did: bot.vacuum.did });
    bot
      .handle(eventName, data, { kind: "push" })
      .catch((err) =>
        this.logger.error("Push handling failed", { event: eventName, message: describeError(err) })
      );
  }
}
