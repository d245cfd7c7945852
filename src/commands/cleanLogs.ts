import type { CleanLogEntry } from "../types";
import { type JsonObject, isJsonObject, toInt, toNumber, toStr } from "../utils/json";
import { GetCommand, type HandlerContext } from "./base";

function toEntry(raw: JsonObject): CleanLogEntry | null {
  const timestamp = toInt(raw.ts);
  if (timestamp === undefined) return null;
  return {
    timestamp,
    imageUrl: toStr(raw.imageUrl),
    type: toStr(raw.type),
    area: toNumber(raw.area),
    stopReason: toStr(raw.stopReason),
    duration: toNumber(raw.last),
  };
}

/**
 * Clean history. Served by the log endpoint rather than the device, so the
 * logs sit at the top level of the response instead of inside a body.
 */
export class GetCleanLogs extends GetCommand {
  readonly name = "GetCleanLogs";

  constructor(count = 0) {
    super({ count });
  }

  handleRequested({ events, logger }: HandlerContext, response: JsonObject): boolean {
    if (response.ret === "ok" && Array.isArray(response.logs)) {
      const logs: CleanLogEntry[] = [];
      for (const raw of response.logs) {
        const entry = isJsonObject(raw) ? toEntry(raw) : null;
        if (entry) logs.push(entry);
      }
      events.cleanLogs.notify({ logs });
      return true;
    }

    logger.warn("Command was not successful", { command: this.name, response });
    return false;
  }
}
