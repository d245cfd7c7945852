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
  WaterInfoEvent,
} from "../types";
import type { EventEmitter, PollingEventEmitter } from "./emitter";

export { EventEmitter, PollingEventEmitter, refreshWith } from "./emitter";
export type { Listener, Refreshable, RefreshFunction, Subscription } from "./emitter";

export type VacuumEmitter = {
  readonly battery: EventEmitter<BatteryEvent>;
  readonly cleanLogs: EventEmitter<CleanLogEvent>;
  readonly customCommand: EventEmitter<CustomCommandEvent>;
  readonly error: EventEmitter<ErrorEvent>;
  readonly fanSpeed: EventEmitter<FanSpeedEvent>;
  readonly lifeSpan: PollingEventEmitter<LifeSpanEvent>;
  readonly map: EventEmitter<MapEvent>;
  readonly stats: EventEmitter<StatsEvent>;
  readonly status: EventEmitter<StatusEvent>;
  readonly waterInfo: EventEmitter<WaterInfoEvent>;
};

