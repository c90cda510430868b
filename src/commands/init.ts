import { writeFileSync, existsSync, mkdirSync } from "fs";
import { join } from "path";
import ora from "ora";
import { getDefaultConfig, getGlobalConfigDir } from "../config";

export interface InitOptions {
  local?: boolean;
}

export async function initCommand(options: InitOptions = {}): Promise<void> {
  const spinner = ora();

  // Determine config path based on --local flag
  let configPath: string;
  if (options.local) {
    configPath = join(process.cwd(), "config.yaml");
  } else {
    const globalDir = getGlobalConfigDir();
    if (!existsSync(globalDir)) {
      mkdirSync(globalDir, { recursive: true });
    }
    configPath = join(globalDir, "config.yaml");
  }

  if (existsSync(configPath)) {
    spinner.info(`Config file already exists: ${configPath}`);
    return;
  }

  spinner.start("Creating config file...");
  writeFileSync(configPath, getDefaultConfig());
  spinner.succeed(`Created config file: ${configPath}`);

  console.log("\nMake sure AWS credentials are available for Rekognition:");
  console.log("  export AWS_ACCESS_KEY_ID=your_key");
  console.log("  export AWS_SECRET_ACCESS_KEY=your_secret");
  console.log("\nThen run:");
  console.log("  facesort match --input-dir ~/Pictures/Family --reference ./me.jpg");
}
