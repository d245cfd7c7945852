import type { WaterLevel } from "../types";
import { type JsonObject, toInt } from "../utils/json";
import { GetCommand, type HandlerContext, SetCommand } from "./base";

export const WATER_LEVEL_VALUES: Record<WaterLevel, number> = {
  low: 1,
  medium: 2,
  high: 3,
  ultrahigh: 4,
};

const WATER_LEVELS: Record<number, WaterLevel | undefined> = {
  1: "low",
  2: "medium",
  3: "high",
  4: "ultrahigh",
};

export class GetWaterInfo extends GetCommand {
  readonly name = "getWaterInfo";

  protected handleBodyDataDict({ events, logger }: HandlerContext, data: JsonObject): boolean {
    const raw = toInt(data.amount);
    const amount = raw === undefined ? undefined : WATER_LEVELS[raw];
    if (!amount) {
      logger.warn("Could not parse water info amount", { data });
      return false;
    }

    events.waterInfo.notify({ mopAttached: Boolean(data.enable), amount });
    return true;
  }
}

function waterLevelValue(amount: WaterLevel | number): number {
  return typeof amount === "number" ? amount : WATER_LEVEL_VALUES[amount];
}

export class SetWaterInfo extends SetCommand {
  readonly name = "setWaterInfo";
  readonly getCommand = new GetWaterInfo();

  private readonly amount: number;

  constructor(amount: WaterLevel | number) {
    // "enable" is read-only on the device; it is sent as 0 and ignored
    super({ amount: waterLevelValue(amount), enable: 0 });
    this.amount = waterLevelValue(amount);
  }

  // keep the mop flag the device last reported instead of the placeholder sent
  protected publishedArgs({ events }: HandlerContext): JsonObject {
    return { amount: this.amount, enable: events.waterInfo.lastEvent?.mopAttached ? 1 : 0 };
  }
}
