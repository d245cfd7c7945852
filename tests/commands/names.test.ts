import { describe, expect, it } from "vitest";
import { COMMAND_NAMES, normalizeCommandName, stripLegacyName } from "../../src/commands";

describe("normalizeCommandName", () => {
  it.each([
    ["onBattery", "getBattery"],
    ["offMap", "getMap"],
    ["reportStats", "getStats"],
    ["onWaterInfo_V2", "getWaterInfo"],
    ["onSpeed", "getSpeed"],
    ["getBattery", "getBattery"],
    ["GetCleanLogs", "GetCleanLogs"],
    ["conBattery", "conBattery"],
  ])("%s -> %s", (input, expected) => {
    expect(normalizeCommandName(input)).toBe(expected);
  });

  it("returns every registered name unchanged", () => {
    for (const name of COMMAND_NAMES) {
      expect(normalizeCommandName(name)).toBe(name);
    }
  });

  it("replaces only the leading prefix", () => {
    expect(normalizeCommandName("onReportOn")).toBe("getReportOn");
  });
});

describe("stripLegacyName", () => {
  it.each([
    ["onMapSet_V2", "mapset"],
    ["reportPos", "pos"],
    ["GetCleanLogs", "cleanlogs"],
    ["offMapTrace", "maptrace"],
    ["Battery", "battery"],
    ["setSpeed", "setspeed"],
  ])("%s -> %s", (input, expected) => {
    expect(stripLegacyName(input)).toBe(expected);
  });
});
