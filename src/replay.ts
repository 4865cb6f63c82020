// ROI Stabilizer - Recorded detection stream replay
//
// Input: JSON Lines, one frame per line:
//   {"sourceId":0,"frameId":12,"frameShape":{"height":1080,"width":1920},"detections":[...]}
// Blank lines and lines starting with "#" are skipped.
//
// Processing is frame-counted and synchronous, so replaying the same file with
// the same config always yields the same output.

import { readFile } from "node:fs/promises";
import { parseDetections, parseFrameShape } from "./detection-validation.js";
import type { FrameProcessor } from "./frame-processor.js";
import type { Detection, FrameShape, RoiBounds, StabilizedDetection } from "./types.js";

export interface ReplayRecord {
  sourceId: number;
  frameId: number;
  frameShape: FrameShape;
  detections: Detection[];
}

export interface ReplayOutput {
  sourceId: number;
  frameId: number;
  /** Box that will crop this source's next frame (null = full frame) */
  roi: RoiBounds | null;
  detections: StabilizedDetection[];
}

/** Parse and validate one JSONL line. `fallbackFrameId` is used when the line has none. */
export function parseReplayLine(line: string, lineNumber: number, fallbackFrameId: number): ReplayRecord {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`Line ${lineNumber}: invalid JSON (${message})`);
  }

  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new Error(`Line ${lineNumber}: expected a JSON object`);
  }

  try {
    const sourceId = "sourceId" in parsed ? parsed.sourceId : 0;
    if (!Number.isInteger(sourceId)) {
      throw new Error(`'sourceId' must be an integer, got ${String(sourceId)}`);
    }
    const frameId = "frameId" in parsed ? parsed.frameId : fallbackFrameId;
    if (!Number.isInteger(frameId)) {
      throw new Error(`'frameId' must be an integer, got ${String(frameId)}`);
    }

    return {
      sourceId: Number(sourceId),
      frameId: Number(frameId),
      frameShape: parseFrameShape("frameShape" in parsed ? parsed.frameShape : undefined),
      detections: parseDetections("detections" in parsed ? parsed.detections : undefined),
    };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`Line ${lineNumber}: ${message}`);
  }
}

/** Parse a whole JSONL document. Frame ids default to the record's position. */
export function parseReplayStream(text: string): ReplayRecord[] {
  const records: ReplayRecord[] = [];
  const lines = text.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (line === "" || line.startsWith("#")) continue;
    records.push(parseReplayLine(line, i + 1, records.length));
  }
  return records;
}

/** Feed records through the processor in order. */
export function replayRecords(records: readonly ReplayRecord[], processor: FrameProcessor): ReplayOutput[] {
  return records.map((record) => {
    const result = processor.onPrediction(record.sourceId, record.detections, record.frameShape);
    return {
      sourceId: record.sourceId,
      frameId: record.frameId,
      roi: result.nextRoi ? result.nextRoi.toBounds() : null,
      detections: result.detections,
    };
  });
}

export async function replayFile(path: string, processor: FrameProcessor): Promise<ReplayOutput[]> {
  const text = await readFile(path, "utf-8");
  return replayRecords(parseReplayStream(text), processor);
}

/** One JSON object per line, trailing newline included. */
export function formatReplayOutput(outputs: readonly ReplayOutput[]): string {
  return outputs.map((output) => JSON.stringify(output)).join("\n") + (outputs.length > 0 ? "\n" : "");
}
