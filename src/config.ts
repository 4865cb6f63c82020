// ROI Stabilizer - Configuration from environment variables
// The CLI loads .env through dotenv before calling loadConfig(). Parsing is
// strict: a malformed value is an error, never a silent default.

import {
  DEFAULT_ADAPTIVE_ROI_CONFIG,
  DEFAULT_FIXED_ROI_CONFIG,
  DEFAULT_IMGSZ,
  validateAdaptiveRoiConfig,
  validateFixedRoiConfig,
  validateImgsz,
} from "./roi-state.js";
import { DEFAULT_STABILIZATION_CONFIG, validateTemporalConfig } from "./stabilizer.js";
import type { AppConfig, RoiMode, StabilizationMode } from "./types.js";

type Env = Record<string, string | undefined>;

// ─── Parsers ────────────────────────────────────────────────────────────────────

function readRaw(env: Env, key: string): string | undefined {
  const raw = env[key];
  if (raw === undefined) return undefined;
  const trimmed = raw.trim();
  return trimmed === "" ? undefined : trimmed;
}

export function readNumber(env: Env, key: string, fallback: number): number {
  const raw = readRaw(env, key);
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`${key} must be a number, got "${raw}"`);
  }
  return value;
}

export function readInteger(env: Env, key: string, fallback: number): number {
  const value = readNumber(env, key, fallback);
  if (!Number.isInteger(value)) {
    throw new Error(`${key} must be an integer, got ${value}`);
  }
  return value;
}

export function readBoolean(env: Env, key: string, fallback: boolean): boolean {
  const raw = readRaw(env, key);
  if (raw === undefined) return fallback;
  switch (raw.toLowerCase()) {
    case "true":
    case "1":
    case "yes":
      return true;
    case "false":
    case "0":
    case "no":
      return false;
    default:
      throw new Error(`${key} must be a boolean (true/false), got "${raw}"`);
  }
}

function readChoice<T extends string>(env: Env, key: string, choices: readonly T[], fallback: T): T {
  const raw = readRaw(env, key);
  if (raw === undefined) return fallback;
  const lowered = raw.toLowerCase();
  const match = choices.find((choice) => choice === lowered);
  if (match === undefined) {
    throw new Error(`${key} must be one of: ${choices.join(", ")}, got "${raw}"`);
  }
  return match;
}

const ROI_MODES: readonly RoiMode[] = ["none", "adaptive", "fixed"];
const STABILIZATION_MODES: readonly StabilizationMode[] = ["none", "temporal"];

// ─── Loader ─────────────────────────────────────────────────────────────────────

/**
 * Build the application config from `env`. Parameters of the selected modes are
 * validated here so a bad deployment fails at startup.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const config: AppConfig = {
    roi: {
      mode: readChoice(env, "ROI_MODE", ROI_MODES, "adaptive"),
      imgsz: readInteger(env, "ROI_IMGSZ", DEFAULT_IMGSZ),
      resizeToModel: readBoolean(env, "ROI_RESIZE_TO_MODEL", false),
      showStatistics: readBoolean(env, "ROI_SHOW_STATISTICS", true),
      adaptive: {
        margin: readNumber(env, "ROI_MARGIN", DEFAULT_ADAPTIVE_ROI_CONFIG.margin),
        smoothingAlpha: readNumber(env, "ROI_SMOOTHING_ALPHA", DEFAULT_ADAPTIVE_ROI_CONFIG.smoothingAlpha),
        minRoiFraction: readNumber(env, "ROI_MIN_FRACTION", DEFAULT_ADAPTIVE_ROI_CONFIG.minRoiFraction),
        minMultiple: readInteger(env, "ROI_MIN_MULTIPLE", DEFAULT_ADAPTIVE_ROI_CONFIG.minMultiple),
        maxMultiple: readInteger(env, "ROI_MAX_MULTIPLE", DEFAULT_ADAPTIVE_ROI_CONFIG.maxMultiple),
      },
      fixed: {
        xMin: readNumber(env, "ROI_FIXED_X_MIN", DEFAULT_FIXED_ROI_CONFIG.xMin),
        yMin: readNumber(env, "ROI_FIXED_Y_MIN", DEFAULT_FIXED_ROI_CONFIG.yMin),
        xMax: readNumber(env, "ROI_FIXED_X_MAX", DEFAULT_FIXED_ROI_CONFIG.xMax),
        yMax: readNumber(env, "ROI_FIXED_Y_MAX", DEFAULT_FIXED_ROI_CONFIG.yMax),
      },
    },
    stabilization: {
      mode: readChoice(env, "STABILIZATION_MODE", STABILIZATION_MODES, DEFAULT_STABILIZATION_CONFIG.mode),
      minFrames: readInteger(env, "STABILIZATION_MIN_FRAMES", DEFAULT_STABILIZATION_CONFIG.minFrames),
      maxGap: readInteger(env, "STABILIZATION_MAX_GAP", DEFAULT_STABILIZATION_CONFIG.maxGap),
      appearConf: readNumber(env, "STABILIZATION_APPEAR_CONF", DEFAULT_STABILIZATION_CONFIG.appearConf),
      persistConf: readNumber(env, "STABILIZATION_PERSIST_CONF", DEFAULT_STABILIZATION_CONFIG.persistConf),
      iouThreshold: readNumber(env, "STABILIZATION_IOU_THRESHOLD", DEFAULT_STABILIZATION_CONFIG.iouThreshold),
    },
  };

  const { roi, stabilization } = config;
  if (roi.mode !== "none") validateImgsz(roi.imgsz);
  if (roi.mode === "adaptive") validateAdaptiveRoiConfig(roi.adaptive);
  if (roi.mode === "fixed") validateFixedRoiConfig(roi.fixed);
  if (stabilization.mode === "temporal") validateTemporalConfig(stabilization);

  return config;
}
