import type { JsonObject } from "../utils/json";
import { Command } from "./base";

export type CleanAction = "start" | "pause" | "resume" | "stop";

export type CleanMode = "auto" | "spotArea" | "customArea";

function actionArgs(action: CleanAction): JsonObject {
  return action === "start" ? { act: action, type: "auto" } : { act: action };
}

/** Starts, pauses, resumes or stops a whole-house clean. */
export class Clean extends Command {
  readonly name = "clean";
  readonly kind = "action";
  readonly action: CleanAction;

  constructor(action: CleanAction, args?: JsonObject) {
    super(args ?? actionArgs(action));
    this.action = action;
  }

  protected handleBodyDataDict(): boolean {
    return true;
  }
}

/**
 * Cleans rooms (`spotArea`, comma separated ids) or a rectangle
 * (`customArea`, "x1,y1,x2,y2").
 */
export class CleanArea extends Clean {
  constructor(mode: CleanMode, area: string, cleanings = 1) {
    super("start", { act: "start", type: mode, content: area, count: cleanings });
  }
}
