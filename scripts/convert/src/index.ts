import * as dotenv from "dotenv";
import path from "path";
import { fileURLToPath } from "url";
import { getConfig } from "./config.js";
import { createLogger, type Logger } from "./logger.js";
import { runConversion } from "./pipeline.js";

export { getConfig, loadConfig, parseArgs, resetConfig, type Config } from "./config.js";
export { runConversion, type ConversionResult } from "./pipeline.js";
export { readEdgesFile, readNodesFile, verifyOutput } from "./reader.js";
export { createLoader, type DatasetLoader } from "./loaders.js";
export { createProjector, type Projector } from "./projection.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// Load environment variables
dotenv.config({ path: path.resolve(__dirname, "../../../.env") });

export async function main(): Promise<void> {
  let logger: Logger = createLogger();
  try {
    const config = getConfig();
    logger = createLogger(config.LOG_LEVEL);
    await runConversion(config, { logger });
  } catch (err) {
    logger.error({ err }, "conversion failed");
    process.exitCode = 1;
  }
}

if (process.argv[1] && path.resolve(process.argv[1]) === __filename) {
  void main();
}
