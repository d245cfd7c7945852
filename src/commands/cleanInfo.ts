import type { VacuumState } from "../types";
import { type JsonObject, isJsonObject } from "../utils/json";
import { GetCommand, type HandlerContext } from "./base";

const MOTION_STATES: Record<string, VacuumState> = {
  working: "cleaning",
  pause: "paused",
  goCharging: "returning",
};

export class GetCleanInfo extends GetCommand {
  readonly name = "getCleanInfo";

  protected handleBodyDataDict({ events, logger }: HandlerContext, data: JsonObject): boolean {
    let state: VacuumState | undefined;

    if (data.trigger === "alert") {
      state = "error";
    } else if (data.state === "clean") {
      const cleanState = isJsonObject(data.cleanState) ? data.cleanState : {};
      const motion = cleanState.motionState;
      if (typeof motion === "string") state = MOTION_STATES[motion];

      const content = isJsonObject(cleanState.content) ? cleanState.content : undefined;
      const type = content && "type" in content ? content.type : cleanState.type;
      if (type === "customArea") {
        logger.debug("Last custom area", { area: content && "value" in content ? content.value : content });
      }
    } else if (data.state === "goCharging") {
      state = "returning";
    } else if (data.state === "idle") {
      state = "idle";
    }

    if (state) {
      events.status.notify({ available: true, state });
    }
    return true;
  }
}
