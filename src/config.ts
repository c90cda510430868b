import { z } from "zod";
import { parse as parseYaml } from "yaml";
import { existsSync, readFileSync } from "fs";
import { homedir } from "os";
import { join, resolve } from "path";
import { ConfigError } from "./errors";

const configSchema = z.object({
  aws: z
    .object({
      region: z.string().default("us-east-1"),
    })
    .default({}),
  rekognition: z
    .object({
      minFaceConfidence: z.number().min(0).max(100).default(90),
      requestTimeoutMs: z.number().int().min(1).default(30000),
      rateLimit: z
        .object({
          minTime: z.number().min(0).default(200),
          maxConcurrent: z.number().min(1).max(20).default(5),
        })
        .default({}),
    })
    .default({}),
  imageProcessing: z
    .object({
      maxDimension: z.number().min(100).max(10000).default(4096),
      jpegQuality: z.number().min(1).max(100).default(90),
    })
    .default({}),
  matching: z
    .object({
      threshold: z.number().min(0).max(1).default(0.8),
    })
    .default({}),
  references: z
    .object({
      maxImages: z.number().int().min(1).max(1000).default(100),
    })
    .default({}),
  batch: z
    .object({
      size: z.number().int().min(1).max(1000).default(20),
      photoTimeoutMs: z.number().int().min(1000).default(60000),
    })
    .default({}),
  output: z
    .object({
      root: z.string().default("./matched_photos"),
    })
    .default({}),
  logging: z
    .object({
      level: z.enum(["trace", "debug", "info", "warn", "error"]).default("info"),
      mainLogFile: z.string().nullable().default("photo_match_log.txt"),
    })
    .default({}),
});

export type Config = z.infer<typeof configSchema>;

const CONFIG_FILENAME = "config.yaml";
const GLOBAL_CONFIG_DIR = join(homedir(), ".config", "facesort");

export function expandPath(p: string): string {
  if (p.startsWith("~/")) {
    return join(homedir(), p.slice(2));
  }
  return resolve(p);
}

export function getGlobalConfigDir(): string {
  return GLOBAL_CONFIG_DIR;
}

export function getConfigPath(): string {
  const localPath = join(process.cwd(), CONFIG_FILENAME);
  if (existsSync(localPath)) {
    return localPath;
  }
  return join(GLOBAL_CONFIG_DIR, CONFIG_FILENAME);
}

/**
 * Validate raw (already parsed) configuration and fill in defaults.
 * Throws ConfigError listing every offending key.
 */
export function parseConfig(raw: unknown): Config {
  const result = configSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `  ${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("\n");
    throw new ConfigError(`Invalid configuration:\n${issues}`);
  }

  const config = result.data;
  config.output.root = expandPath(config.output.root);
  if (config.logging.mainLogFile) {
    config.logging.mainLogFile = expandPath(config.logging.mainLogFile);
  }
  return config;
}

export function loadConfig(configPath: string = getConfigPath()): Config {
  if (!existsSync(configPath)) {
    // Return defaults if no config exists
    return parseConfig({});
  }

  const content = readFileSync(configPath, "utf-8");
  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Could not parse ${configPath}: ${message}`);
  }
  return parseConfig(raw);
}

export function getDefaultConfig(): string {
  return `# facesort Configuration

aws:
  region: us-east-1

rekognition:
  minFaceConfidence: 90     # Ignore detections below this confidence (0-100)
  requestTimeoutMs: 30000   # Fail an API call after this long and free its slot
  rateLimit:
    minTime: 200            # Minimum ms between requests
    maxConcurrent: 5        # Max concurrent API calls

imageProcessing:
  maxDimension: 4096        # Max pixel dimension before resizing
  jpegQuality: 90           # Quality for JPEG conversion (1-100)

matching:
  threshold: 0.8            # MATCHED at or above; ALMOST MATCHED within 0.1 below

references:
  maxImages: 100            # Reference faces loaded from a directory

batch:
  size: 20                  # Photos per chunk
  photoTimeoutMs: 60000     # Give up on a photo's detection and comparison after this long

output:
  root: ./matched_photos    # Each run writes to <root>_<YYYYMMDD_HHMMSS>

logging:
  level: info
  mainLogFile: photo_match_log.txt   # Shared across runs; null to disable
`;
}
