import { describe, test, expect, vi, afterEach } from "vitest";
import {
  DEFAULT_SETTINGS,
  resolveServerVersion,
  resolveSettings,
  settingsFromConfiguration,
} from "@luahint/language-server/api";

afterEach(() => {
  vi.unstubAllEnvs();
});

describe("resolveSettings", () => {
  test("defaults to hints on with the 5.1 grammar", () => {
    expect(resolveSettings(undefined)).toEqual({ enable: true, luaVersion: "5.1" });
    expect(DEFAULT_SETTINGS).toEqual({ enable: true, luaVersion: "5.1" });
  });

  test("takes well-typed values", () => {
    expect(resolveSettings({ enable: false, luaVersion: "LuaJIT" })).toEqual({
      enable: false,
      luaVersion: "LuaJIT",
    });
  });

  test("falls back per field for values of the wrong type", () => {
    expect(resolveSettings({ enable: "no", luaVersion: "5.4" })).toEqual({ enable: true, luaVersion: "5.1" });
    expect(resolveSettings({ enable: false, luaVersion: 5.2 })).toEqual({ enable: false, luaVersion: "5.1" });
    expect(resolveSettings(["5.3"])).toEqual({ enable: true, luaVersion: "5.1" });
  });

  test("returns a fresh object each time", () => {
    const settings = resolveSettings(null);
    settings.enable = false;
    expect(DEFAULT_SETTINGS.enable).toBe(true);
  });
});

describe("settingsFromConfiguration", () => {
  const current = { enable: false, luaVersion: "5.3" as const };

  test("reads the luahint section", () => {
    expect(settingsFromConfiguration({ luahint: { luaVersion: "5.2" } }, current)).toEqual({
      enable: true,
      luaVersion: "5.2",
    });
  });

  test("keeps the current settings without a luahint section", () => {
    expect(settingsFromConfiguration({ other: {} }, current)).toBe(current);
    expect(settingsFromConfiguration(null, current)).toBe(current);
  });
});

describe("resolveServerVersion", () => {
  test("prefers LUAHINT_VERSION", () => {
    vi.stubEnv("LUAHINT_VERSION", "1.2.3");
    vi.stubEnv("npm_package_version", "0.0.1");
    expect(resolveServerVersion()).toBe("1.2.3");
  });

  test("falls back to the package version, then to dev", () => {
    vi.stubEnv("LUAHINT_VERSION", "");
    vi.stubEnv("npm_package_version", "0.1.0-test");
    expect(resolveServerVersion()).toBe("0.1.0-test");

    vi.stubEnv("npm_package_version", "");
    expect(resolveServerVersion()).toBe("dev");
  });
});
