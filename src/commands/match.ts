import ora, { type Ora } from "ora";
import cliProgress from "cli-progress";
import { basename } from "path";
import { expandPath, loadConfig, type Config } from "../config";
import { ConfigError, errorMessage } from "../errors";
import { createRunLogger, type Logger, type RunLogger } from "../logger";
import { RekognitionFaceEngine } from "../recognition/client";
import type { FaceEngine } from "../recognition/types";
import { loadReferences, type ReferenceSource } from "../references/loader";
import { assertImageDirectory, assertImageFile, listInputPhotos, type InputSource } from "../sources/local";
import { deriveThresholds, describeThresholdRanges } from "../matching/classifier";
import type { Thresholds } from "../matching/types";
import { FolderBucketRouter, prepareRunLayout, writeSummary as writeSummaryFile } from "../export/folder";
import type { RunLayout } from "../export/types";
import { BatchOrchestrator } from "../pipeline/batch";
import { formatSummary, summarize } from "../pipeline/report";

export interface MatchOptions {
  inputDir?: string;
  inputFile?: string;
  reference?: string;
  referenceDir?: string;
  threshold?: number;
  output?: string;
  batchSize?: number;
  config?: string;
}

/** Collaborators a run can be given instead of the production ones. */
export interface MatchDependencies {
  createEngine?: (config: Config, log: Logger) => FaceEngine<unknown>;
  writeSummary?: (summaryPath: string, summary: object) => void;
}

function createRekognitionEngine(config: Config, log: Logger): FaceEngine<unknown> {
  return new RekognitionFaceEngine(config, undefined, log);
}

interface RunSetup {
  config: Config;
  input: InputSource;
  references: ReferenceSource;
  thresholds: Thresholds;
  photos: string[];
}

function pickSource(
  file: string | undefined,
  dir: string | undefined,
  flags: [string, string]
): InputSource {
  if (file && dir) {
    throw new ConfigError(`Use either ${flags[0]} or ${flags[1]}, not both`);
  }
  if (file) return { kind: "file", path: expandPath(file) };
  if (dir) return { kind: "directory", path: expandPath(dir) };
  throw new ConfigError(`One of ${flags[0]} or ${flags[1]} is required`);
}

/** Everything that can fail before any output is written. */
function resolveSetup(options: MatchOptions): RunSetup {
  const config = loadConfig(options.config ? expandPath(options.config) : undefined);
  const input = pickSource(options.inputFile, options.inputDir, ["--input-file", "--input-dir"]);
  const references = pickSource(options.reference, options.referenceDir, ["--reference", "--reference-dir"]);
  const thresholds = deriveThresholds(options.threshold ?? config.matching.threshold);

  const photos = listInputPhotos(input);
  if (references.kind === "file") {
    assertImageFile(references.path, "Reference image");
  } else {
    assertImageDirectory(references.path, "Reference directory");
  }

  return { config, input, references, thresholds, photos };
}

/** Resolves to the process exit code. */
export async function matchCommand(options: MatchOptions, deps: MatchDependencies = {}): Promise<number> {
  const startedAt = new Date();
  const spinner = ora();

  let setup: RunSetup;
  let layout: RunLayout;
  try {
    setup = resolveSetup(options);
    layout = prepareRunLayout(expandPath(options.output ?? setup.config.output.root), startedAt);
  } catch (error) {
    console.error(`\nError: ${errorMessage(error)}`);
    return 1;
  }

  const { config } = setup;
  const runLogger = createRunLogger({
    runLogPath: layout.runLogPath,
    mainLogPath: config.logging.mainLogFile,
    level: config.logging.level,
  });

  try {
    return await runMatch(setup, layout, runLogger, options, deps, startedAt, spinner);
  } catch (error) {
    spinner.stop();
    runLogger.log.error({ error: errorMessage(error) }, `An error occurred: ${errorMessage(error)}`);
    console.error(`\nError: ${errorMessage(error)}`);
    return 1;
  } finally {
    runLogger.close();
  }
}

async function runMatch(
  setup: RunSetup,
  layout: RunLayout,
  runLogger: RunLogger,
  options: MatchOptions,
  deps: MatchDependencies,
  startedAt: Date,
  spinner: Ora
): Promise<number> {
  const { config, input, references, thresholds, photos } = setup;
  const log = runLogger.log;
  const ranges = describeThresholdRanges(thresholds);

  log.info({ runDir: layout.runDir }, `Created output directory with timestamp: ${layout.runDir}`);
  log.info({ runLogPath: layout.runLogPath }, `Run-specific log file created at: ${layout.runLogPath}`);
  log.info(thresholds, ranges);
  log.info(
    { input: input.path, kind: input.kind, count: photos.length },
    input.kind === "directory"
      ? `Found ${photos.length} images in directory: ${input.path}`
      : `Processing single image file: ${input.path}`
  );

  console.log(`\nOutput directory: ${layout.runDir}`);
  console.log(`Log file: ${layout.runLogPath}`);
  console.log(`\n${ranges}\n`);

  const createEngine = deps.createEngine ?? createRekognitionEngine;
  const engine = createEngine(config, log.child({ component: "engine" }));

  spinner.start("Loading reference faces...");
  const { store, report } = await loadReferences(references, engine, log.child({ component: "references" }), {
    maxImages: config.references.maxImages,
    onReference: (path, loaded) => {
      spinner.text = `Loading reference faces... ${loaded} loaded (${basename(path)})`;
    },
  });
  const skippedNote = report.skipped + report.overCap > 0
    ? ` (skipped ${report.skipped} invalid, ${report.overCap} over limit)`
    : "";
  spinner.succeed(`Loaded ${report.loaded} reference face${report.loaded === 1 ? "" : "s"}${skippedNote}`);

  console.log("Starting processing...");

  const progressBar = new cliProgress.SingleBar(
    {
      format: "Progress |{bar}| {percentage}% | {value}/{total} images processed | Errors: {errors} | {file}",
      barsize: 30,
    },
    cliProgress.Presets.shades_classic
  );
  progressBar.start(photos.length, 0, { errors: 0, file: "" });

  const abort = new AbortController();
  const onSigint = () => abort.abort();
  process.once("SIGINT", onSigint);

  const router = new FolderBucketRouter(layout.buckets);
  const orchestrator = new BatchOrchestrator(engine, router, log.child({ component: "batch" }));

  const outcome = await orchestrator
    .run(photos, store, thresholds, {
      batchSize: options.batchSize ?? config.batch.size,
      photoTimeoutMs: config.batch.photoTimeoutMs,
      signal: abort.signal,
      onProgress: ({ processed, counters, current }) => {
        progressBar.update(processed, { errors: counters.errors, file: basename(current) });
      },
    })
    .finally(() => {
      process.removeListener("SIGINT", onSigint);
      progressBar.stop();
    });

  const summary = summarize(outcome.counters, startedAt, new Date());
  log.info(
    summary,
    `Processing complete: ${summary.processed} images processed, ${summary.matched} matches found, ` +
      `${summary.almostMatched} almost matches, ${summary.notMatched} not matched, ${summary.errors} errors. ` +
      `Duration: ${summary.durationSeconds.toFixed(2)} seconds`
  );

  if (outcome.cancelled) {
    console.log(`\nRun cancelled after ${summary.processed} of ${photos.length} images.`);
  }
  console.log("");
  for (const line of formatSummary(summary, { layout, mainLogPath: config.logging.mainLogFile })) {
    console.log(line);
  }

  const writeSummary = deps.writeSummary ?? writeSummaryFile;
  try {
    writeSummary(layout.summaryPath, { ...summary, cancelled: outcome.cancelled, failures: outcome.failures });
  } catch (error) {
    log.error({ summaryPath: layout.summaryPath, error: errorMessage(error) }, "Could not write summary file");
    console.error(`\nError: ${errorMessage(error)}`);
    return 1;
  }
  return 0;
}
