import { mkdtemp, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { describe, expect, it } from "vitest";
import { configure, defaults, getConfig, loadConfigFile, resetConfig } from "../src/config.js";
import { ConfigError } from "../src/errors.js";
import { getLogLevel } from "../src/utils/logger.js";

describe("config", () => {
  it("starts from the defaults", () => {
    expect(getConfig()).toEqual(defaults);
    expect(getConfig().faults.propagate).toBe(false);
    expect(getConfig().timeouts).toEqual({ job: 0, handler: 0 });
  });

  it("merges overrides section by section", () => {
    configure({ timeouts: { job: 5 }, handlers: { retries: 2 } });
    expect(getConfig().timeouts).toEqual({ job: 5, handler: 0 });
    expect(getConfig().handlers).toEqual({ reusable: false, retries: 2, historyLimit: 100 });
    expect(getConfig().retry).toEqual(defaults.retry);
  });

  it("applies each call on top of the defaults", () => {
    configure({ timeouts: { job: 5 } });
    configure({ timeouts: { handler: 7 } });
    expect(getConfig().timeouts).toEqual({ job: 0, handler: 7 });
  });

  it("rejects invalid values and keeps the current config", () => {
    configure({ handlers: { retries: 1 } });
    expect(() => configure({ timeouts: { job: -1 } })).toThrow(ConfigError);
    expect(() => configure({ timeouts: { job: -1 } })).toThrow("Invalid config: timeouts.job:");
    expect(getConfig().handlers.retries).toBe(1);
  });

  it("rejects unknown sections", () => {
    try {
      configure(JSON.parse('{"scheduler":{"workers":4}}'));
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      expect(err).toMatchObject({ code: "CONFIG_INVALID" });
    }
  });

  it("applies the log level", () => {
    configure({ logging: { level: "debug" } });
    expect(getLogLevel()).toBe("debug");
  });

  it("resets to the defaults", () => {
    configure({ faults: { propagate: true } });
    resetConfig();
    expect(getConfig()).toEqual(defaults);
  });

  it("loads overrides from a JSON file", async () => {
    await loadConfigFile(fileURLToPath(new URL("./fixtures/config.json", import.meta.url)));
    expect(getConfig().faults).toEqual({ propagate: true, rejectOnFailure: false });
    expect(getConfig().timeouts).toEqual({ job: 0, handler: 250 });
  });

  it("reports a config file that cannot be read or parsed", async () => {
    const dir = await mkdtemp(join(tmpdir(), "task-commander-"));
    const broken = join(dir, "broken.json");
    await writeFile(broken, "{ not json", "utf8");

    await expect(loadConfigFile(join(dir, "missing.json"))).rejects.toThrow("Could not read config file");
    await expect(loadConfigFile(broken)).rejects.toBeInstanceOf(ConfigError);
  });
});
