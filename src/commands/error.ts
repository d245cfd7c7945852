import { type JsonObject, toInt } from "../utils/json";
import { GetCommand, type HandlerContext } from "./base";
import errorCodes from "./errorCodes.json";

const descriptions: Record<string, string> = errorCodes;

export function describeErrorCode(code: number): string | undefined {
  return descriptions[String(code)];
}

export class GetError extends GetCommand {
  readonly name = "getError";

  protected handleBodyDataDict({ events, logger }: HandlerContext, data: JsonObject): boolean {
    // the device reports a list; the last entry is the current error
    const codes = Array.isArray(data.code) ? data.code : [];
    const code = codes.length > 0 ? toInt(codes[codes.length - 1]) : undefined;
    if (code === undefined) {
      logger.warn("Could not process error event", { data });
      return false;
    }

    if (code !== 0) {
      events.status.notify({ available: true, state: "error" });
    }
    events.error.notify({ code, description: describeErrorCode(code) });
    return true;
  }
}
