import type { JsonObject } from "../utils/json";
import { type CommandArgs, Command, type HandlerContext } from "./base";

/** Any command this library does not model; the raw response is published as is. */
export class CustomCommand extends Command {
  readonly name: string;
  readonly kind = "custom";

  constructor(name: string, args: CommandArgs = {}) {
    super(args);
    this.name = name;
  }

  handleRequested({ events, logger }: HandlerContext, response: JsonObject): boolean {
    if (response.ret === "ok") {
      const data = "resp" in response ? response.resp : response;
      events.customCommand.notify({ name: this.name, response: data });
      return true;
    }

    logger.warn("Command was not successful", { command: this.name, response });
    return false;
  }
}
