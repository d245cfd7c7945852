import type { LifeSpanComponent } from "../types";
import { type JsonValue, isJsonObject, toNumber } from "../utils/json";
import { GetCommand, type HandlerContext } from "./base";

export const LIFE_SPAN_COMPONENTS: readonly LifeSpanComponent[] = ["brush", "sideBrush", "heap"];

function isComponent(value: JsonValue | undefined): value is LifeSpanComponent {
  return typeof value === "string" && LIFE_SPAN_COMPONENTS.some((c) => c === value);
}

export class GetLifeSpan extends GetCommand {
  readonly name = "getLifeSpan";

  constructor() {
    super([...LIFE_SPAN_COMPONENTS]);
  }

  protected handleBodyDataList({ events }: HandlerContext, data: JsonValue[]): boolean {
    const lifespan: Partial<Record<LifeSpanComponent, number>> = {};
    let found = false;

    for (const item of data) {
      if (!isJsonObject(item) || !isComponent(item.type)) continue;
      const left = toNumber(item.left);
      const total = toNumber(item.total);
      if (left === undefined || total === undefined || total <= 0) continue;
      lifespan[item.type] = Math.round((left / total) * 10000) / 100;
      found = true;
    }

    if (!found) return false;
    events.lifeSpan.notify({ lifespan });
    return true;
  }
}
