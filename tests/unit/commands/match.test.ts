import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { readdirSync, readFileSync, writeFileSync } from "fs";
import { join } from "path";
import { matchCommand, type MatchOptions } from "../../../src/commands/match";
import { FileAccessError } from "../../../src/errors";
import { FakeFaceEngine, makeTempDir, writeFiles } from "../../helpers/fake-engine";

describe("matchCommand", () => {
  let root: string;
  let engine: FakeFaceEngine;
  let printed: string[];
  let errors: string[];

  beforeEach(() => {
    root = makeTempDir();
    engine = new FakeFaceEngine();
    printed = [];
    errors = [];
    vi.spyOn(console, "log").mockImplementation((line?: unknown) => {
      printed.push(String(line));
    });
    vi.spyOn(console, "error").mockImplementation((line?: unknown) => {
      errors.push(String(line));
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  function options(references: Record<string, string>, photos: Record<string, string>): MatchOptions {
    const configPath = join(root, "config.yaml");
    writeFileSync(configPath, "logging:\n  mainLogFile: null\n");
    return {
      referenceDir: writeFiles(join(root, "refs"), references),
      inputDir: writeFiles(join(root, "photos"), photos),
      output: join(root, "out"),
      config: configPath,
    };
  }

  function runDir(): string {
    const name = readdirSync(root).find((entry) => entry.startsWith("out_"));
    if (!name) throw new Error("no run directory");
    return join(root, name);
  }

  it("sorts the photos, prints the summary and writes summary.json", async () => {
    const code = await matchCommand(
      options({ "me.jpg": "faces:0.1" }, { "a.jpg": "faces:0.1", "b.jpg": "faces:0.6" }),
      { createEngine: () => engine }
    );

    expect(code).toBe(0);
    expect(printed).toContain("Summary:");
    expect(printed).toContain("  Images processed: 2");
    const summary = JSON.parse(readFileSync(join(runDir(), "summary.json"), "utf-8"));
    expect(summary).toMatchObject({ processed: 2, matched: 1, notMatched: 1, errors: 0, cancelled: false });
    expect(readdirSync(join(runDir(), "matched"))).toEqual(["a.jpg"]);
  });

  it("still prints the summary when summary.json cannot be written", async () => {
    const code = await matchCommand(options({ "me.jpg": "faces:0.1" }, { "a.jpg": "faces:0.1" }), {
      createEngine: () => engine,
      writeSummary: () => {
        throw new FileAccessError("disk full");
      },
    });

    expect(code).toBe(1);
    expect(printed).toContain("Summary:");
    expect(printed).toContain("  Images processed: 1");
    expect(printed).toContain(`  Matches found: 1 (saved to ${join(runDir(), "matched")})`);
    expect(errors).toEqual(["\nError: disk full"]);
  });

  it("stops before the batch when no reference yields a face", async () => {
    const opts = options({ "blank.jpg": "faces:" }, { "a.jpg": "faces:0.1" });

    const code = await matchCommand(opts, { createEngine: () => engine });

    expect(code).toBe(1);
    expect(errors).toEqual([
      `\nError: No valid reference faces found in the reference directory: ${opts.referenceDir}`,
    ]);
    expect(engine.detectCalls).toEqual(["faces:"]);
    expect(printed).not.toContain("Summary:");
  });

  it("reports a setup error without creating a run", async () => {
    const opts = options({ "me.jpg": "faces:0.1" }, { "a.jpg": "faces:0.1" });

    const both = { ...opts, inputFile: join(root, "photos", "a.jpg") };

    const code = await matchCommand(both, { createEngine: () => engine });

    expect(code).toBe(1);
    expect(errors).toEqual(["\nError: Use either --input-file or --input-dir, not both"]);
    expect(readdirSync(root).some((entry) => entry.startsWith("out_"))).toBe(false);
    expect(engine.detectCalls).toEqual([]);
  });
});
