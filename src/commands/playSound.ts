import { Command } from "./base";

export class PlaySound extends Command {
  readonly name = "playSound";
  readonly kind = "action";

  constructor(sid = 30) {
    super({ count: 1, sid });
  }

  protected handleBodyDataDict(): boolean {
    return true;
  }
}
