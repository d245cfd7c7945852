const PUSH_PREFIX = /^(on|off|report)/;
const LEGACY_PREFIXES = ["on", "off", "report", "get"];
const VERSION_SUFFIX = /_v2$/i;

/**
 * Maps a pushed event name onto the get command that answers with the same
 * data: "onBattery" -> "getBattery", "reportStats" -> "getStats",
 * "onWaterInfo_V2" -> "getWaterInfo". Canonical names come back unchanged.
 */
export function normalizeCommandName(name: string): string {
  return name.replace(PUSH_PREFIX, "get").replace(VERSION_SUFFIX, "");
}

/** Reduces an old style event name to its topic: "onMapSet_V2" -> "mapset". */
export function stripLegacyName(name: string): string {
  let topic = name.toLowerCase();
  const prefix = LEGACY_PREFIXES.find((p) => topic.startsWith(p));
  if (prefix) {
    topic = topic.slice(prefix.length);
  }
  return topic.replace(VERSION_SUFFIX, "");
}
