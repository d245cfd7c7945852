import { type Mock, vi } from "vitest";
import type { CommandTransport, SendOptions } from "../src/api/client";
import type { Command, HandlerContext } from "../src/commands";
import { EventEmitter, PollingEventEmitter, type VacuumEmitter } from "../src/events";
import type {
  BatteryEvent,
  CleanLogEvent,
  CustomCommandEvent,
  ErrorEvent,
  FanSpeedEvent,
  LifeSpanEvent,
  MapEvent,
  StatsEvent,
  StatusEvent,
  Vacuum,
  WaterInfoEvent,
} from "../src/types";
import type { JsonObject } from "../src/utils/json";
import type { Logger } from "../src/utils/logger";

export type TestLogger = Logger & { debug: Mock; info: Mock; warn: Mock; error: Mock };

export function createTestLogger(): TestLogger {
  const logger: TestLogger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: () => logger,
  };
  return logger;
}

export function createEmitters(logger: Logger): VacuumEmitter {
  const status = new EventEmitter<StatusEvent>("status", null, logger);
  return {
    battery: new EventEmitter<BatteryEvent>("battery", null, logger),
    cleanLogs: new EventEmitter<CleanLogEvent>("cleanLogs", null, logger),
    customCommand: new EventEmitter<CustomCommandEvent>("customCommand", null, logger),
    error: new EventEmitter<ErrorEvent>("error", null, logger),
    fanSpeed: new EventEmitter<FanSpeedEvent>("fanSpeed", null, logger),
    lifeSpan: new PollingEventEmitter<LifeSpanEvent>("lifeSpan", 60, async () => {}, status, logger),
    map: new EventEmitter<MapEvent>("map", null, logger),
    stats: new EventEmitter<StatsEvent>("stats", null, logger),
    status,
    waterInfo: new EventEmitter<WaterInfoEvent>("waterInfo", null, logger),
  };
}

export function createContext(): HandlerContext & { logger: TestLogger } {
  const logger = createTestLogger();
  return { events: createEmitters(logger), logger };
}

export const vacuum: Vacuum = {
  did: "did-1",
  class: "cls-1",
  resource: "res-1",
  name: "Test bot",
  status: 1,
};

export const OK_RESPONSE: JsonObject = {
  ret: "ok",
  resp: { header: { pri: 1, ts: "1700000000000", ver: "0.0.1" }, body: { code: 0, msg: "ok" } },
};

export type Responder = (command: Command) => JsonObject | Promise<JsonObject>;

/** In-process transport: records commands and answers through `responder`. */
export class FakeTransport implements CommandTransport {
  readonly commands: Command[] = [];
  inFlight = 0;
  maxInFlight = 0;
  private responder: Responder;

  constructor(responder: Responder = () => OK_RESPONSE) {
    this.responder = responder;
  }

  get names(): string[] {
    return this.commands.map((c) => c.name);
  }

  async sendCommand(command: Command, _vacuum: Vacuum, options: SendOptions = {}): Promise<JsonObject> {
    this.commands.push(command);
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      return await new Promise<JsonObject>((resolve, reject) => {
        options.signal?.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
        Promise.resolve()
          .then(() => this.responder(command))
          .then(resolve, reject);
      });
    } finally {
      this.inFlight--;
    }
  }
}

/** A body-wrapped response for a requested command. */
export function okWith(data: JsonObject): JsonObject {
  return { ret: "ok", resp: { header: { pri: 1 }, body: { code: 0, msg: "ok", data } } };
}
