#!/usr/bin/env tsx

import { Command, InvalidArgumentError } from "commander";
import { initCommand } from "./commands/init";
import { matchCommand, type MatchOptions } from "./commands/match";

function parseThreshold(value: string): number {
  const threshold = Number(value);
  if (value.trim() === "" || !Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
    throw new InvalidArgumentError("Threshold must be between 0.0 and 1.0");
  }
  return threshold;
}

function parsePositiveInt(value: string): number {
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Must be a positive integer");
  }
  return parsed;
}

const program = new Command();

program
  .name("facesort")
  .description("Sort photos into matched, almost matched and not matched folders by face similarity")
  .version("0.1.0");

program
  .command("init")
  .description("Create a default config.yaml")
  .option("--local", "Create config in current directory instead of global location")
  .action(initCommand);

program
  .command("match")
  .description("Classify photos against reference faces and copy them into bucket folders")
  .option("--input-dir <dir>", "Directory of photos to classify")
  .option("--input-file <file>", "Single photo to classify")
  .option("--reference <image>", "Single reference face image")
  .option("--reference-dir <dir>", "Directory of reference face images")
  .option("-t, --threshold <n>", "Matching confidence threshold (0.0-1.0, default: 0.8)", parseThreshold)
  .option("-o, --output <path>", "Output directory prefix (default: ./matched_photos)")
  .option("--batch-size <n>", "Photos per processing chunk", parsePositiveInt)
  .option("-c, --config <path>", "Config file (default: ./config.yaml, then ~/.config/facesort/config.yaml)")
  .action(async (options: MatchOptions) => {
    process.exitCode = await matchCommand(options);
  });

program.parseAsync().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
