import { GetBattery } from "./battery";
import type { Command } from "./base";
import { Charge } from "./charge";
import { GetChargeState } from "./chargeState";
import { Clean } from "./clean";
import { GetCleanInfo } from "./cleanInfo";
import { GetCleanLogs } from "./cleanLogs";
import { GetError } from "./error";
import { GetFanSpeed, SetFanSpeed } from "./fanSpeed";
import { GetLifeSpan } from "./lifeSpan";
import { PlaySound } from "./playSound";
import { GetStats } from "./stats";
import { GetWaterInfo, SetWaterInfo } from "./waterInfo";

export { Command, GetCommand, SetCommand } from "./base";
export type { CommandArgs, CommandKind, HandlerContext } from "./base";
export { GetBattery } from "./battery";
export { Charge } from "./charge";
export { GetChargeState } from "./chargeState";
export { Clean, CleanArea } from "./clean";
export type { CleanAction, CleanMode } from "./clean";
export { GetCleanInfo } from "./cleanInfo";
export { GetCleanLogs } from "./cleanLogs";
export { CustomCommand } from "./custom";
export { GetError, describeErrorCode } from "./error";
export { FAN_SPEED_VALUES, GetFanSpeed, SetFanSpeed } from "./fanSpeed";
export { GetLifeSpan, LIFE_SPAN_COMPONENTS } from "./lifeSpan";
export { normalizeCommandName, stripLegacyName } from "./names";
export { PlaySound } from "./playSound";
export { GetStats } from "./stats";
export { GetWaterInfo, SetWaterInfo, WATER_LEVEL_VALUES } from "./waterInfo";

/** Parse-only view of a command, as kept in the registry. */
export type CommandDescriptor = Pick<Command, "name" | "kind" | "handle">;

export function buildRegistry(descriptors: readonly CommandDescriptor[]): ReadonlyMap<string, CommandDescriptor> {
  const registry = new Map<string, CommandDescriptor>();
  for (const descriptor of descriptors) {
    if (registry.has(descriptor.name)) {
      throw new Error(`Duplicate command name in registry: ${descriptor.name}`);
    }
    registry.set(descriptor.name, descriptor);
  }
  return registry;
}

// Parsing ignores arguments, so set commands are registered with placeholder values.
// ordered by file name
const COMMANDS = buildRegistry([
  new GetBattery(),
  new Charge(),
  new GetChargeState(),
  new Clean("start"),
  new GetCleanInfo(),
  new GetCleanLogs(),
  new GetError(),
  new GetFanSpeed(),
  new SetFanSpeed("normal"),
  new GetLifeSpan(),
  new PlaySound(),
  new GetStats(),
  new GetWaterInfo(),
  new SetWaterInfo("medium"),
]);

export const COMMAND_NAMES: readonly string[] = [...COMMANDS.keys()];

export const SET_COMMAND_NAMES: readonly string[] = [...COMMANDS.values()]
  .filter((command) => command.kind === "set")
  .map((command) => command.name);

export function getCommand(name: string): CommandDescriptor | undefined {
  return COMMANDS.get(name);
}
