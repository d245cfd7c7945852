import { isDeepStrictEqual } from "node:util";
import type { VacuumEmitter } from "../events";
import type { Logger } from "../utils/logger";
import { type JsonObject, type JsonValue, isJsonObject, toInt } from "../utils/json";

export type CommandKind = "get" | "set" | "action" | "custom";

export type CommandArgs = JsonObject | JsonValue[];

export type HandlerContext = {
  events: VacuumEmitter;
  logger: Logger;
};

/**
 * A wire command. Parsing methods return true when the payload was valid and
 * carried no error; they publish whatever events the payload implies.
 */
export abstract class Command {
  abstract readonly name: string;
  abstract readonly kind: CommandKind;
  readonly args: CommandArgs;

  constructor(args: CommandArgs = {}) {
    this.args = args;
  }

  /** Parses an unsolicited message (legacy `{ body: ... }` wrapper or bare body). */
  handle(ctx: HandlerContext, message: JsonObject): boolean {
    const body = isJsonObject(message.body) ? message.body : message;
    return this.handleBody(ctx, body);
  }

  /** Parses the portal's answer to this exact command. */
  handleRequested(ctx: HandlerContext, response: JsonObject): boolean {
    if (response.ret === "ok") {
      const message = isJsonObject(response.resp) ? response.resp : response;
      return this.handle(ctx, message);
    }

    ctx.logger.warn("Command was not successful", { command: this.name, response });
    return false;
  }

  equals(other: Command): boolean {
    return this.name === other.name && isDeepStrictEqual(this.args, other.args);
  }

  protected handleBody(ctx: HandlerContext, body: JsonObject): boolean {
    if (!("code" in body) || toInt(body.code) === 0) {
      return this.handleBodyData(ctx, "data" in body ? body.data : body);
    }

    ctx.logger.warn("Command was not successful", { command: this.name, body });
    return false;
  }

  protected handleBodyData(ctx: HandlerContext, data: JsonValue): boolean {
    if (isJsonObject(data)) return this.handleBodyDataDict(ctx, data);
    if (Array.isArray(data)) return this.handleBodyDataList(ctx, data);
    return false;
  }

  protected handleBodyDataDict(_ctx: HandlerContext, _data: JsonObject): boolean {
    return false;
  }

  protected handleBodyDataList(_ctx: HandlerContext, _data: JsonValue[]): boolean {
    return false;
  }
}

export abstract class GetCommand extends Command {
  readonly kind: CommandKind = "get";
}

/**
 * A command that changes a device setting. Pushes for it carry nothing new;
 * a successful response republishes the sent value through the companion get command.
 */
export abstract class SetCommand extends Command {
  readonly kind: CommandKind = "set";
  abstract readonly getCommand: GetCommand;

  handleRequested(ctx: HandlerContext, response: JsonObject): boolean {
    const accepted = super.handleRequested(ctx, response);
    if (accepted) {
      this.getCommand.handle(ctx, this.publishedArgs(ctx));
    }
    return accepted;
  }

  protected handleBodyDataDict(): boolean {
    return true;
  }

  protected publishedArgs(_ctx: HandlerContext): JsonObject {
    return isJsonObject(this.args) ? this.args : {};
  }
}
