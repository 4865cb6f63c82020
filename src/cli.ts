#!/usr/bin/env node
// ROI Stabilizer - Replay entry point
// Replays a recorded detection stream (JSONL) through the configured ROI
// strategy and stabilizer, writing one output record per frame.
//
// Usage: roi-stabilizer-replay <input.jsonl> [output.jsonl]

import "dotenv/config";
import { writeFile } from "node:fs/promises";
import { APP_NAME, APP_VERSION } from "./index.js";
import { loadConfig } from "./config.js";
import { createConsoleLogger } from "./logger.js";
import { createFrameProcessor } from "./frame-processor.js";
import { formatReplayOutput, replayFile } from "./replay.js";

const ts = () => new Date().toISOString();
// stderr, so stdout stays clean JSONL
const logInit = (msg: string) => console.error(`[INIT] [${ts()}] ${msg}`);
const logFatal = (msg: string) => console.error(`[FATAL] [${ts()}] ${msg}`);

const [inputPath, outputPath] = process.argv.slice(2);

if (!inputPath) {
  logFatal("Usage: roi-stabilizer-replay <input.jsonl> [output.jsonl]");
  process.exit(1);
}

async function main(input: string): Promise<void> {
  logInit(`${APP_NAME} v${APP_VERSION}`);

  const config = loadConfig();
  logInit(`ROI mode: ${config.roi.mode}, stabilization mode: ${config.stabilization.mode}`);

  const processor = createFrameProcessor(config, createConsoleLogger("Replay", { stderrOnly: true }));
  const outputs = await replayFile(input, processor);
  const text = formatReplayOutput(outputs);

  if (outputPath) {
    await writeFile(outputPath, text, "utf-8");
    logInit(`Wrote ${outputs.length} frames to ${outputPath}`);
  } else {
    process.stdout.write(text);
  }
}

main(inputPath).catch((err: unknown) => {
  logFatal(err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
});
