import { describe, it, expect } from "vitest";
import { writeFileSync } from "fs";
import { homedir } from "os";
import { join, resolve } from "path";
import { parse as parseYaml } from "yaml";
import { getDefaultConfig, loadConfig, parseConfig } from "../../src/config";
import { ConfigError } from "../../src/errors";
import { makeTempDir } from "../helpers/fake-engine";

describe("parseConfig", () => {
  it("fills in defaults", () => {
    const config = parseConfig({});
    expect(config.matching.threshold).toBe(0.8);
    expect(config.references.maxImages).toBe(100);
    expect(config.batch).toEqual({ size: 20, photoTimeoutMs: 60000 });
    expect(config.output.root).toBe(resolve("./matched_photos"));
    expect(config.logging.mainLogFile).toBe(resolve("photo_match_log.txt"));
  });

  it("expands ~ in paths", () => {
    const config = parseConfig({ output: { root: "~/sorted" }, logging: { mainLogFile: null } });
    expect(config.output.root).toBe(join(homedir(), "sorted"));
    expect(config.logging.mainLogFile).toBeNull();
  });

  it("lists every invalid key", () => {
    expect(() => parseConfig({ matching: { threshold: 2 }, batch: { size: 0 } })).toThrow(ConfigError);
    try {
      parseConfig({ matching: { threshold: 2 }, batch: { size: 0 } });
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      const message = error instanceof Error ? error.message : "";
      expect(message).toContain("matching.threshold");
      expect(message).toContain("batch.size");
    }
  });

  it("accepts the default config file it writes", () => {
    const config = parseConfig(parseYaml(getDefaultConfig()));
    expect(config).toEqual(parseConfig({}));
  });
});

describe("loadConfig", () => {
  it("reads YAML from the given path", () => {
    const path = join(makeTempDir(), "config.yaml");
    writeFileSync(path, "matching:\n  threshold: 0.65\nbatch:\n  size: 5\n");

    const config = loadConfig(path);
    expect(config.matching.threshold).toBe(0.65);
    expect(config.batch.size).toBe(5);
    expect(config.batch.photoTimeoutMs).toBe(60000);
  });

  it("falls back to defaults when the file does not exist", () => {
    const config = loadConfig(join(makeTempDir(), "missing.yaml"));
    expect(config).toEqual(parseConfig({}));
  });

  it("reports malformed YAML as a config error", () => {
    const path = join(makeTempDir(), "config.yaml");
    writeFileSync(path, "matching: [unclosed\n");
    expect(() => loadConfig(path)).toThrow(ConfigError);
  });
});
