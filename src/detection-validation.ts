// ROI Stabilizer - Per-frame input validation
// Malformed detections are a precondition violation: fail fast before any
// track state is touched.

import type { Detection, FrameShape } from "./types.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

/**
 * Validate one detection record and return it as a typed Detection.
 * Throws with the offending index and field.
 */
export function parseDetection(value: unknown, index: number = 0): Detection {
  const prefix = `Detection ${index}`;
  if (!isRecord(value)) {
    throw new Error(`${prefix}: expected an object, got ${value === null ? "null" : typeof value}`);
  }

  const cls = value["class"];
  if (typeof cls !== "string" || cls.length === 0) {
    throw new Error(`${prefix}: missing or invalid 'class'`);
  }

  const confidence = value["confidence"];
  if (!isFiniteNumber(confidence) || confidence < 0 || confidence > 1) {
    throw new Error(`${prefix}: 'confidence' must be a number in [0, 1], got ${String(confidence)}`);
  }

  const coords: Record<"x" | "y" | "width" | "height", number> = { x: 0, y: 0, width: 0, height: 0 };
  for (const field of ["x", "y", "width", "height"] as const) {
    const v = value[field];
    if (!isFiniteNumber(v)) {
      throw new Error(`${prefix}: missing or invalid '${field}'`);
    }
    if ((field === "width" || field === "height") && v < 0) {
      throw new Error(`${prefix}: '${field}' must be >= 0, got ${v}`);
    }
    coords[field] = v;
  }

  const detection: Detection = { class: cls, confidence, ...coords };

  const classId = value["classId"];
  if (classId !== undefined) {
    if (!Number.isInteger(classId)) {
      throw new Error(`${prefix}: 'classId' must be an integer, got ${String(classId)}`);
    }
    detection.classId = Number(classId);
  }

  return detection;
}

/** Validate a whole frame's detection list (e.g. parsed JSON). */
export function parseDetections(value: unknown): Detection[] {
  if (!Array.isArray(value)) {
    throw new Error(`Detections must be an array, got ${value === null ? "null" : typeof value}`);
  }
  return value.map((item: unknown, i) => parseDetection(item, i));
}

/**
 * Check typed detections without copying them.
 * Catches NaN / out-of-range values a type checker cannot see.
 */
export function assertValidDetections(detections: readonly Detection[]): void {
  for (let i = 0; i < detections.length; i++) {
    parseDetection(detections[i], i);
  }
}

export function parseFrameShape(value: unknown): FrameShape {
  if (!isRecord(value)) {
    throw new Error("frameShape: expected an object with height and width");
  }
  const { height, width } = value;
  if (!Number.isInteger(height) || Number(height) < 0 || !Number.isInteger(width) || Number(width) < 0) {
    throw new Error(`frameShape: height and width must be non-negative integers, got ${String(height)}x${String(width)}`);
  }
  return { height: Number(height), width: Number(width) };
}
