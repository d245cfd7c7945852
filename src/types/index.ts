import type { JsonValue } from "../utils/json";

export type VacuumState = "idle" | "cleaning" | "returning" | "docked" | "error" | "paused";

export type Vacuum = {
  did: string;
  class: string;
  resource: string;
  name?: string;
  // 1 = online as reported by the device list
  status: number;
};

export type RequestAuth = {
  userId: string;
  realm: string;
  token: string;
  resource: string;
};

export type WaterLevel = "low" | "medium" | "high" | "ultrahigh";

export type FanSpeedLevel = "quiet" | "normal" | "max" | "max+";

export type LifeSpanComponent = "brush" | "sideBrush" | "heap";

export type BatteryEvent = Readonly<{ value: number }>;

export type CleanLogEntry = Readonly<{
  timestamp: number;
  imageUrl?: string;
  type?: string;
  area?: number;
  stopReason?: string;
  // seconds
  duration?: number;
}>;

export type CleanLogEvent = Readonly<{ logs: readonly CleanLogEntry[] }>;

export type ErrorEvent = Readonly<{ code: number; description?: string }>;

export type FanSpeedEvent = Readonly<{ speed: FanSpeedLevel }>;

export type LifeSpanEvent = Readonly<{
  // percent left per component
  lifespan: Readonly<Partial<Record<LifeSpanComponent, number>>>;
}>;

export type StatsEvent = Readonly<{
  area?: number;
  time?: number;
  type?: string;
  cleanId?: string;
  start?: number;
}>;

export type StatusEvent = Readonly<{ available: boolean; state: VacuumState | null }>;

export type WaterInfoEvent = Readonly<{ mopAttached: boolean; amount: WaterLevel }>;

export type CustomCommandEvent = Readonly<{ name: string; response: JsonValue }>;

export type MapEvent = Readonly<{ name: string; data: JsonValue }>;
