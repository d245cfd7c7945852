import { type JsonObject, toInt } from "../utils/json";
import { Command, type HandlerContext } from "./base";

const ALREADY_CHARGING = 30007;

export class Charge extends Command {
  readonly name = "charge";
  readonly kind = "action";

  constructor() {
    super({ act: "go" });
  }

  protected handleBody({ events, logger }: HandlerContext, body: JsonObject): boolean {
    const code = "code" in body ? toInt(body.code) : 0;
    if (code === 0) {
      events.status.notify({ available: true, state: "returning" });
      return true;
    }
    if (code === ALREADY_CHARGING) {
      events.status.notify({ available: true, state: "docked" });
      return true;
    }

    logger.warn("Command was not successful", { command: this.name, body });
    return false;
  }
}
