import type { VacuumState } from "../types";
import { type JsonObject, toInt, toStr } from "../utils/json";
import { GetCommand, type HandlerContext } from "./base";

// Failure codes that still say something about the bot's state.
const FAILURE_STATES: Record<string, VacuumState> = {
  "30007": "docked", // already charging
  "5": "error", // busy with another command
  "3": "error", // stuck, e.g. dust bin out
};

export class GetChargeState extends GetCommand {
  readonly name = "getChargeState";

  protected handleBody(ctx: HandlerContext, body: JsonObject): boolean {
    if (!("code" in body) || toInt(body.code) === 0) {
      return super.handleBody(ctx, body);
    }

    const code = toStr(body.code);
    const reported = body.msg === "fail" && code !== undefined ? FAILURE_STATES[code] : undefined;
    if (reported) {
      // TODO: publish `reported` instead of docked once busy/stuck replies are checked against real devices
      ctx.events.status.notify({ available: true, state: "docked" });
      return true;
    }

    ctx.logger.warn("Command was not successful", { command: this.name, body });
    return false;
  }

  protected handleBodyDataDict({ events }: HandlerContext, data: JsonObject): boolean {
    if (toInt(data.isCharging) === 1) {
      events.status.notify({ available: true, state: "docked" });
    }
    return true;
  }
}
