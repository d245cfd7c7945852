import type { FanSpeedLevel } from "../types";
import { type JsonObject, toInt } from "../utils/json";
import { GetCommand, type HandlerContext, SetCommand } from "./base";

export const FAN_SPEED_VALUES: Record<FanSpeedLevel, number> = {
  quiet: 1000,
  normal: 0,
  max: 1,
  "max+": 2,
};

const FAN_SPEEDS: Record<number, FanSpeedLevel | undefined> = {
  1000: "quiet",
  0: "normal",
  1: "max",
  2: "max+",
};

export class GetFanSpeed extends GetCommand {
  readonly name = "getSpeed";

  protected handleBodyDataDict({ events, logger }: HandlerContext, data: JsonObject): boolean {
    const value = toInt(data.speed);
    const speed = value === undefined ? undefined : FAN_SPEEDS[value];
    if (!speed) {
      logger.warn("Unknown fan speed", { data });
      return false;
    }

    events.fanSpeed.notify({ speed });
    return true;
  }
}

export class SetFanSpeed extends SetCommand {
  readonly name = "setSpeed";
  readonly getCommand = new GetFanSpeed();

  constructor(speed: FanSpeedLevel | number) {
    super({ speed: typeof speed === "number" ? speed : FAN_SPEED_VALUES[speed] });
  }
}
