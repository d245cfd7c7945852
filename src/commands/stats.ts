import { type JsonObject, toInt, toNumber, toStr } from "../utils/json";
import { GetCommand, type HandlerContext } from "./base";

export class GetStats extends GetCommand {
  readonly name = "getStats";

  protected handleBodyDataDict({ events }: HandlerContext, data: JsonObject): boolean {
    events.stats.notify({
      area: toNumber(data.area),
      time: toNumber(data.time),
      type: toStr(data.type),
      cleanId: toStr(data.cid),
      start: toInt(data.start),
    });
    return true;
  }
}
