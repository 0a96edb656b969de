import "dotenv/config";
import { loadConfig } from "./lib/config.js";
import { PipelineError, errorMessage } from "./lib/errors.js";
import { runPipeline } from "./lib/pipeline.js";

const config = loadConfig();

try {
  const { succeeded, failed } = await runPipeline(config);
  console.log(`Done: ${succeeded} downloaded, ${failed.length} failed`);
  if (failed.length > 0) process.exitCode = 2;
} catch (e) {
  const tag = e instanceof PipelineError ? e.code : "FATAL";
  console.error(`[${tag}] ${errorMessage(e)}`);
  process.exitCode = 1;
}
