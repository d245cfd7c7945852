import { type JsonObject, toNumber } from "../utils/json";
import { GetCommand, type HandlerContext } from "./base";

export class GetBattery extends GetCommand {
  readonly name = "getBattery";

  protected handleBodyDataDict({ events }: HandlerContext, data: JsonObject): boolean {
    const value = toNumber(data.value);
    if (value === undefined) return false;

    events.battery.notify({ value });
    return true;
  }
}
