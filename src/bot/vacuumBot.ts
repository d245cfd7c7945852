import { v4 as uuidv4 } from "uuid";
import type { CommandTransport } from "../api/client";
import {
  Clean,
  type Command,
  GetBattery,
  GetChargeState,
  GetCleanInfo,
  GetCleanLogs,
  GetError,
  GetFanSpeed,
  GetLifeSpan,
  GetStats,
  GetWaterInfo,
  type HandlerContext,
  getCommand,
  normalizeCommandName,
  stripLegacyName,
} from "../commands";
import { EventEmitter, PollingEventEmitter, type Refreshable, refreshWith } from "../events/emitter";
import type { VacuumEmitter } from "../events";
import { type MapCollaborator, MapRelay } from "../map/relay";
import type {
  BatteryEvent,
  CleanLogEvent,
  CustomCommandEvent,
  ErrorEvent,
  FanSpeedEvent,
  LifeSpanEvent,
  StatsEvent,
  StatusEvent,
  Vacuum,
  WaterInfoEvent,
} from "../types";
import { BotDisposedError, ContractViolationError } from "../utils/errors";
import { type JsonObject, isJsonObject } from "../utils/json";
import type { Logger } from "../utils/logger";
import { Semaphore } from "../utils/semaphore";

export type VacuumBotOptions = {
  transport: CommandTransport;
  logger: Logger;
  map?: MapCollaborator;
  concurrency?: number;
  lifeSpanPollIntervalSeconds?: number;
};

/** Where a payload came from: the answer to a command we sent, or a push. */
export type DispatchOrigin = { kind: "requested"; command: Command } | { kind: "push" };

// Topics served by the registry; reaching the legacy path with one is a bug.
const REGISTRY_TOPICS = new Set([
  "speed",
  "waterinfo",
  "lifespan",
  "stats",
  "battery",
  "chargestate",
  "charge",
  "clean",
  "cleanlogs",
  "error",
  "playsound",
  "cleaninfo",
]);

const START = new Clean("start");
const RESUME = new Clean("resume");

export class VacuumBot {
  readonly vacuum: Vacuum;
  readonly events: VacuumEmitter;
  readonly map: MapCollaborator;
  private transport: CommandTransport;
  private logger: Logger;
  private semaphore: Semaphore;
  private abort = new AbortController();
  private refreshTargets: readonly Refreshable[];
  private context: HandlerContext;
  private current: StatusEvent | null = null;
  private firmware: string | null = null;
  private disposed = false;

  constructor(vacuum: Vacuum, options: VacuumBotOptions) {
    this.vacuum = vacuum;
    this.transport = options.transport;
    this.logger = options.logger.child({ component: "bot", device: vacuum.did });
    this.semaphore = new Semaphore(options.concurrency ?? 3);
    this.map = options.map ?? new MapRelay(this.logger);

    const execute = (command: Command) => this.executeCommand(command);
    const refresh = (...commands: Command[]) => refreshWith(commands, execute);
    const logger = this.logger;

    const status = new EventEmitter<StatusEvent>(
      "status",
      refresh(new GetChargeState(), new GetCleanInfo()),
      logger
    );
    this.events = {
      battery: new EventEmitter<BatteryEvent>("battery", refresh(new GetBattery()), logger),
      cleanLogs: new EventEmitter<CleanLogEvent>("cleanLogs", refresh(new GetCleanLogs()), logger),
      customCommand: new EventEmitter<CustomCommandEvent>("customCommand", null, logger),
      error: new EventEmitter<ErrorEvent>("error", refresh(new GetError()), logger),
      fanSpeed: new EventEmitter<FanSpeedEvent>("fanSpeed", refresh(new GetFanSpeed()), logger),
      lifeSpan: new PollingEventEmitter<LifeSpanEvent>(
        "lifeSpan",
        options.lifeSpanPollIntervalSeconds ?? 60,
        refresh(new GetLifeSpan()),
        status,
        logger
      ),
      map: this.map.events.map,
      stats: new EventEmitter<StatsEvent>("stats", refresh(new GetStats()), logger),
      status,
      waterInfo: new EventEmitter<WaterInfoEvent>("waterInfo", refresh(new GetWaterInfo()), logger),
    };
    const { battery, cleanLogs, customCommand, error, fanSpeed, lifeSpan, map, stats, waterInfo } = this.events;
    this.refreshTargets = [battery, cleanLogs, customCommand, error, fanSpeed, lifeSpan, map, stats, waterInfo];
    this.context = { events: this.events, logger };

    status.notify({ available: vacuum.status === 1, state: null });
    status.subscribe((event) => this.onStatus(event));
  }

  get status(): StatusEvent {
    return this.current ?? { available: false, state: null };
  }

  get fwVersion(): string | null {
    return this.firmware;
  }

  /** Sends a command and dispatches its response. Transport failures are rethrown. */
  async executeCommand(command: Command): Promise<void> {
    if (this.disposed) throw new BotDisposedError(this.vacuum.did);

    const resolved = this.resolveCleanAction(command);
    const requestId = uuidv4();
    const signal = this.abort.signal;
    this.logger.debug("Executing command", { command: resolved.name, requestId });

    const response = await this.semaphore.withLock(
      () => this.transport.sendCommand(resolved, this.vacuum, { signal, requestId }),
      signal
    );
    await this.handle(resolved.name, response, { kind: "requested", command: resolved });
  }

  /** Entry point for command responses and pushed events. */
  async handle(commandName: string, payload: JsonObject, origin: DispatchOrigin): Promise<void> {
    this.logger.debug("Handle", { command: commandName, origin: origin.kind, payload });

    if (origin.kind === "requested") {
      // the wire name of a response can be ambiguous; the command knows its own shape
      this.report(commandName, origin.command.handleRequested(this.context, payload));
      return;
    }

    const descriptor = getCommand(normalizeCommandName(commandName));
    if (descriptor) {
      this.report(commandName, descriptor.handle(this.context, payload));
      return;
    }

    await this.handleLegacy(commandName, payload);
  }

  setAvailable(available: boolean): void {
    this.events.status.notify({ available, state: this.status.state });
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.logger.info("Disposing bot");
    this.abort.abort(new BotDisposedError(this.vacuum.did));
    this.events.status.dispose();
    for (const emitter of this.refreshTargets) {
      emitter.dispose();
    }
  }

  private resolveCleanAction(command: Command): Command {
    const paused = this.status.state === "paused";
    if (command.equals(RESUME) && !paused) return START;
    if (command.equals(START) && paused) return RESUME;
    return command;
  }

  private report(commandName: string, parsed: boolean): void {
    if (!parsed) {
      this.logger.warn("Could not parse response", { command: commandName });
    }
  }

  private onStatus(event: StatusEvent): void {
    const last = this.current;
    this.current = event;
    if (!last) return;

    if (!last.available && event.available) {
      this.logger.info("Bot became available, refreshing all topics");
      for (const emitter of this.refreshTargets) {
        emitter.requestRefresh();
      }
    } else if (last.state !== "docked" && event.state === "docked") {
      this.events.cleanLogs.requestRefresh();
    }
  }

  private async handleLegacy(eventName: string, payload: JsonObject): Promise<void> {
    const topic = stripLegacyName(eventName);
    if (REGISTRY_TOPICS.has(topic)) {
      throw new ContractViolationError(`Event "${eventName}" must be handled by the command registry`);
    }

    const { header, body } = payload;
    if (
      !isJsonObject(header) ||
      !isJsonObject(body) ||
      Object.keys(header).length === 0 ||
      Object.keys(body).length === 0
    ) {
      this.logger.warn("Invalid event", { event: eventName, payload });
      return;
    }

    if (typeof header.fwVer === "string" && header.fwVer !== "") {
      this.firmware = header.fwVer;
    }

    const data = "data" in body ? body.data : {};
    if (topic.includes("map") || topic === "pos") {
      await this.map.handle(topic, data, false);
    } else if (topic.startsWith("set")) {
      // set pushes echo values we already know
    } else {
      this.logger.debug("Unknown event", { event: eventName, payload });
    }
  }
}
