// ROI Stabilizer - ROI state per video source
// Two interchangeable strategies behind one signature:
//   - AdaptiveRoiState: follows detections, one smoothed square box per source
//   - FixedRoiState: a static normalized region, identical for every source
//
// Single writer per source: the frame-processing call for a source is the only
// code that mutates that source's entry. No internal locking.

import { RoiBox } from "./roi-box.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import type { AdaptiveRoiConfig, BoundingBox, FixedRoiConfig, FrameShape } from "./types.js";

// ─── Defaults ───────────────────────────────────────────────────────────────────

export const DEFAULT_ADAPTIVE_ROI_CONFIG: AdaptiveRoiConfig = {
  margin: 0.2,
  smoothingAlpha: 0.3,
  minRoiFraction: 0.3,
  minMultiple: 1,
  maxMultiple: 4,
};

export const DEFAULT_FIXED_ROI_CONFIG: FixedRoiConfig = {
  xMin: 0.2,
  yMin: 0.2,
  xMax: 0.8,
  yMax: 0.8,
};

export const DEFAULT_IMGSZ = 320;

// ─── Validation ─────────────────────────────────────────────────────────────────

function isUnitInterval(value: number): boolean {
  return Number.isFinite(value) && value >= 0 && value <= 1;
}

export function validateImgsz(imgsz: number): void {
  if (!Number.isInteger(imgsz) || imgsz <= 0) {
    throw new Error(`imgsz must be a positive integer, got ${imgsz}`);
  }
}

/** Throws a descriptive error for the first invalid adaptive parameter. */
export function validateAdaptiveRoiConfig(config: AdaptiveRoiConfig): void {
  if (!isUnitInterval(config.margin)) {
    throw new Error(`margin must be in [0.0, 1.0], got ${config.margin}`);
  }
  if (!isUnitInterval(config.smoothingAlpha)) {
    throw new Error(`smoothingAlpha must be in [0.0, 1.0], got ${config.smoothingAlpha}`);
  }
  if (!isUnitInterval(config.minRoiFraction)) {
    throw new Error(`minRoiFraction must be in [0.0, 1.0], got ${config.minRoiFraction}`);
  }
  if (!Number.isInteger(config.minMultiple) || config.minMultiple < 1) {
    throw new Error(`minMultiple must be an integer >= 1, got ${config.minMultiple}`);
  }
  if (!Number.isInteger(config.maxMultiple) || config.maxMultiple < config.minMultiple) {
    throw new Error(
      `maxMultiple (${config.maxMultiple}) must be an integer >= minMultiple (${config.minMultiple})`,
    );
  }
}

export function validateFixedRoiConfig(config: FixedRoiConfig): void {
  const { xMin, yMin, xMax, yMax } = config;
  if (!(isUnitInterval(xMin) && isUnitInterval(xMax) && xMin < xMax)) {
    throw new Error(
      `Invalid x coordinates: xMin=${xMin}, xMax=${xMax}. Must be in [0.0, 1.0] with xMin < xMax`,
    );
  }
  if (!(isUnitInterval(yMin) && isUnitInterval(yMax) && yMin < yMax)) {
    throw new Error(
      `Invalid y coordinates: yMin=${yMin}, yMax=${yMax}. Must be in [0.0, 1.0] with yMin < yMax`,
    );
  }
}

// ─── Shared Options ─────────────────────────────────────────────────────────────

export interface RoiStateOptions {
  /** Model input size in pixels. Default: 320 */
  imgsz?: number;
  /** Upscale small crops to imgsz×imgsz before inference. Default: false */
  resizeToModel?: boolean;
  logger?: Logger;
}

// ─── Adaptive ───────────────────────────────────────────────────────────────────

/**
 * Adaptive ROI: a square box per source, derived from the previous frame's detections.
 *
 * Boxes are always square and sized in multiples of imgsz so the crop resizes
 * cleanly to the model input (640 → 320 is an exact 2× downscale).
 */
export class AdaptiveRoiState {
  readonly kind = "adaptive" as const;
  readonly supportsToggle = true;
  readonly imgsz: number;
  readonly resizeToModel: boolean;
  readonly config: AdaptiveRoiConfig;
  private roiBySource: Map<number, RoiBox | null>;
  private logger: Logger;

  constructor(config: Partial<AdaptiveRoiConfig> = {}, options: RoiStateOptions = {}) {
    this.config = { ...DEFAULT_ADAPTIVE_ROI_CONFIG, ...config };
    this.imgsz = options.imgsz ?? DEFAULT_IMGSZ;
    this.resizeToModel = options.resizeToModel ?? false;
    this.logger = options.logger ?? createConsoleLogger("AdaptiveRoi");

    validateAdaptiveRoiConfig(this.config);
    validateImgsz(this.imgsz);

    this.roiBySource = new Map();
  }

  /** Current box for the source, or null to use the full frame. */
  getRoi(sourceId: number, _frame?: FrameShape): RoiBox | null {
    return this.roiBySource.get(sourceId) ?? null;
  }

  /**
   * Derive the next frame's box from this frame's detections (pixel coordinates).
   *
   * 1. Enclose all detections
   * 2. Square multiple of imgsz
   * 3. Expand by margin, keeping the square
   * 4. Too small relative to the frame → full frame
   * 5. Smooth against the previous box
   */
  updateFromDetections(sourceId: number, detections: readonly BoundingBox[], frame: FrameShape): void {
    const enclosing = RoiBox.enclosing(detections);
    if (enclosing === null) {
      this.roiBySource.set(sourceId, null);
      return;
    }

    const { imgsz } = this;
    const { margin, minMultiple, maxMultiple, minRoiFraction, smoothingAlpha } = this.config;

    let roi = enclosing
      .makeSquareMultiple(imgsz, minMultiple, maxMultiple, frame)
      .expand(margin, frame, true);

    if (!roi.isSquare) {
      this.logger.warn(`Source ${sourceId}: ROI not square after expand: ${roi.width}×${roi.height}`);
    }

    const frameArea = frame.height * frame.width;
    if (roi.area < minRoiFraction * frameArea) {
      this.logger.debug(`Source ${sourceId}: ROI too small (${roi.area}/${frameArea}), using full frame`);
      this.roiBySource.set(sourceId, null);
      return;
    }

    const previous = this.roiBySource.get(sourceId) ?? null;
    if (previous !== null) {
      roi = roi.smoothWith(previous, smoothingAlpha, frame);
    }

    this.roiBySource.set(sourceId, roi);
    this.logger.debug(`Source ${sourceId}: ROI updated to ${roi.toString()}`);
  }

  /** Back to full frame for one source, or for all sources when omitted. */
  reset(sourceId?: number): void {
    if (sourceId === undefined) {
      this.roiBySource.clear();
      this.logger.info("ROI state reset for all sources");
    } else {
      this.roiBySource.set(sourceId, null);
      this.logger.info(`ROI state reset for source ${sourceId}`);
    }
  }
}

// ─── Fixed ──────────────────────────────────────────────────────────────────────

/**
 * Fixed ROI: the same normalized region for every source and every frame.
 * Pixel boxes are cached per frame shape.
 */
export class FixedRoiState {
  readonly kind = "fixed" as const;
  readonly supportsToggle = false;
  readonly imgsz: number;
  readonly resizeToModel: boolean;
  readonly config: FixedRoiConfig;
  private cache: Map<string, RoiBox>;
  private logger: Logger;

  constructor(config: Partial<FixedRoiConfig> = {}, options: RoiStateOptions = {}) {
    this.config = { ...DEFAULT_FIXED_ROI_CONFIG, ...config };
    this.imgsz = options.imgsz ?? DEFAULT_IMGSZ;
    this.resizeToModel = options.resizeToModel ?? false;
    this.logger = options.logger ?? createConsoleLogger("FixedRoi");

    validateFixedRoiConfig(this.config);
    validateImgsz(this.imgsz);

    this.cache = new Map();
  }

  /**
   * The configured region in pixels. Without a frame shape there is nothing to
   * scale against, so the full frame is used.
   */
  getRoi(_sourceId: number, frame?: FrameShape): RoiBox | null {
    if (frame === undefined) {
      this.logger.warn("getRoi() called without frame shape, using full frame");
      return null;
    }

    const key = `${frame.height}x${frame.width}`;
    const cached = this.cache.get(key);
    if (cached) return cached;

    const { xMin, yMin, xMax, yMax } = this.config;
    const roi = new RoiBox(
      Math.trunc(xMin * frame.width),
      Math.trunc(yMin * frame.height),
      Math.trunc(xMax * frame.width),
      Math.trunc(yMax * frame.height),
    );
    this.cache.set(key, roi);
    this.logger.debug(`Frame ${key} -> ROI ${roi.toString()}`);
    return roi;
  }

  updateFromDetections(_sourceId: number, _detections: readonly BoundingBox[], _frame: FrameShape): void {
    // static region
  }

  reset(_sourceId?: number): void {
    this.logger.debug("reset() ignored for fixed coordinates");
  }
}

export type RoiStrategy = AdaptiveRoiState | FixedRoiState;
