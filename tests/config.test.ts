import { describe, expect, it } from "vitest";
import { loadSettings } from "../src/lib/config";

describe("loadSettings", () => {
  it("uses caffeinate and the default schedules", () => {
    expect(loadSettings({})).toEqual({
      keepAwake: ["caffeinate", "-dimsu"],
      mountRoot: "/Volumes",
      detach: { delayMs: 30_000, intervalMs: 10_000, maxAttempts: 3 },
      snapshotDetach: { delayMs: 0, intervalMs: 5_000, maxAttempts: 3 },
    });
  });

  it("applies environment overrides", () => {
    const settings = loadSettings({
      FUJI_DETACH_DELAY_MS: "0",
      FUJI_DETACH_ATTEMPTS: "5",
      FUJI_MOUNT_ROOT: "/mnt",
      FUJI_NO_CAFFEINATE: "1",
    });
    expect(settings.keepAwake).toEqual([]);
    expect(settings.mountRoot).toBe("/mnt");
    expect(settings.detach).toEqual({ delayMs: 0, intervalMs: 10_000, maxAttempts: 5 });
  });

  it("rejects malformed numbers", () => {
    expect(() => loadSettings({ FUJI_DETACH_ATTEMPTS: "three" })).toThrow('FUJI_DETACH_ATTEMPTS must be an integer, got "three"');
    expect(() => loadSettings({ FUJI_DETACH_ATTEMPTS: "0" })).toThrow();
  });
});
