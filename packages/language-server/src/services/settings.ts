/**
 * Server settings: what the client may configure under the `luahint` section,
 * either as `initializationOptions` or through `workspace/didChangeConfiguration`.
 *
 * Anything missing or of the wrong type falls back to the default.
 */
import { DEFAULT_LUA_VERSION, isLuaVersion, type LuaVersion } from "@luahint/analyzer";

export const SETTINGS_SECTION = "luahint";

export interface ServerSettings {
  /** Publish inlay hints at all. */
  enable: boolean;
  /** Grammar the parser accepts. */
  luaVersion: LuaVersion;
}

export const DEFAULT_SETTINGS: Readonly<ServerSettings> = Object.freeze({
  enable: true,
  luaVersion: DEFAULT_LUA_VERSION,
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function resolveSettings(raw: unknown): ServerSettings {
  if (!isRecord(raw)) return { ...DEFAULT_SETTINGS };
  const enable = raw["enable"];
  const luaVersion = raw["luaVersion"];
  return {
    enable: typeof enable === "boolean" ? enable : DEFAULT_SETTINGS.enable,
    luaVersion: isLuaVersion(luaVersion) ? luaVersion : DEFAULT_SETTINGS.luaVersion,
  };
}

/**
 * Settings from a didChangeConfiguration payload. Clients send either the whole
 * settings object (`{ luahint: {...} }`) or nothing (pull model); the latter
 * keeps the current settings.
 */
export function settingsFromConfiguration(settings: unknown, current: ServerSettings): ServerSettings {
  if (!isRecord(settings) || !(SETTINGS_SECTION in settings)) return current;
  return resolveSettings(settings[SETTINGS_SECTION]);
}

export function resolveServerVersion(): string {
  // empty variables count as unset
  return process.env["LUAHINT_VERSION"]
    || process.env["npm_package_version"]
    || "dev";
}
