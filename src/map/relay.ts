import { EventEmitter } from "../events/emitter";
import type { MapEvent } from "../types";
import type { JsonValue } from "../utils/json";
import type { Logger } from "../utils/logger";

/** The narrow surface the bot needs from a map implementation. */
export interface MapCollaborator {
  readonly events: { readonly map: EventEmitter<MapEvent> };
  handle(eventName: string, data: JsonValue, requested: boolean): Promise<void>;
}

/**
 * Forwards map and position pushes unchanged as map events. Consumers that
 * need geometry decode `data` themselves.
 */
export class MapRelay implements MapCollaborator {
  readonly events: { readonly map: EventEmitter<MapEvent> };
  private logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger.child({ component: "map" });
    this.events = { map: new EventEmitter<MapEvent>("map", null, this.logger) };
  }

  async handle(eventName: string, data: JsonValue, requested: boolean): Promise<void> {
    this.logger.debug("Map event", { event: eventName, requested });
    this.events.map.notify({ name: eventName, data });
  }
}
