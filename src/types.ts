// ROI Stabilizer - Shared TypeScript interfaces and types
// Records exchanged with the inference runtime and the external sinks
// (telemetry publisher, MQTT bridge, overlay renderer).

// ─── Detections ─────────────────────────────────────────────────────────────────

/** Axis-aligned box in center + size form, as produced by YOLO-style models. */
export interface BoundingBox {
  x: number;
  y: number;
  width: number;
  height: number;
}

/**
 * One raw model detection for one frame.
 * Units (normalized or pixels) must be consistent across everything compared via IoU.
 */
export interface Detection extends BoundingBox {
  class: string;
  /** Model confidence in [0, 1] */
  confidence: number;
  classId?: number;
}

/** Tracking metadata attached to each emitted detection. */
export interface StabilizationInfo {
  avgConfidence: number;
  framesTracked: number;
}

export interface StabilizedDetection extends Detection {
  stabilization?: StabilizationInfo;
}

// ─── Frames ─────────────────────────────────────────────────────────────────────

/** Frame geometry in pixels. */
export interface FrameShape {
  height: number;
  width: number;
}

// ─── Configuration ──────────────────────────────────────────────────────────────

export type RoiMode = "none" | "adaptive" | "fixed";

export interface AdaptiveRoiConfig {
  /** Expansion around detections as a fraction of the frame (0.2 = 20%). Default: 0.2 */
  margin: number;
  /** Weight of the previous box when smoothing (0 = no smoothing). Default: 0.3 */
  smoothingAlpha: number;
  /** Minimum ROI area as a fraction of the frame area. Default: 0.3 */
  minRoiFraction: number;
  /** Smallest ROI side as a multiple of imgsz. Default: 1 */
  minMultiple: number;
  /** Largest ROI side as a multiple of imgsz. Default: 4 */
  maxMultiple: number;
}

export interface FixedRoiConfig {
  /** Normalized [0, 1] corner coordinates */
  xMin: number;
  yMin: number;
  xMax: number;
  yMax: number;
}

export interface RoiStrategyConfig {
  mode: RoiMode;
  /** Model input size in pixels (e.g. 320, 640) */
  imgsz: number;
  /** Upscale crops smaller than imgsz to imgsz×imgsz before inference */
  resizeToModel: boolean;
  /** Attach crop metadata to inference results */
  showStatistics: boolean;
  adaptive: AdaptiveRoiConfig;
  fixed: FixedRoiConfig;
}

export type StabilizationMode = "none" | "temporal";

export interface StabilizationConfig {
  mode: StabilizationMode;
  /** Consecutive qualifying frames required to confirm a track. Default: 3 */
  minFrames: number;
  /** Missed frames tolerated before a track is evicted. Default: 2 */
  maxGap: number;
  /** Confidence needed to start (or re-confirm) tracking. Default: 0.5 */
  appearConf: number;
  /** Confidence needed to keep a confirmed track alive. Default: 0.3 */
  persistConf: number;
  /** Minimum IoU for the spatial matching strategy. Default: 0.3 */
  iouThreshold: number;
}

export interface AppConfig {
  roi: RoiStrategyConfig;
  stabilization: StabilizationConfig;
}

// ─── Observability Records ──────────────────────────────────────────────────────

export interface CropOffset {
  x: number;
  y: number;
  /** Crop pixels per model pixel on each axis (1 when no upscale was applied) */
  scaleX: number;
  scaleY: number;
}

export interface RoiBounds {
  x1: number;
  y1: number;
  x2: number;
  y2: number;
  width: number;
  height: number;
  area: number;
  isSquare: boolean;
}

export interface CropPerformance {
  imgsz: number | null;
  sizeMultiple: number;
  cropRatio: number;
  pixelReduction: number;
  frameSize: FrameShape;
}

/** Forwarded verbatim by the external telemetry publisher. */
export interface CropMetadata {
  enabled: boolean;
  cropApplied: boolean;
  cropOffset: CropOffset | null;
  roi: RoiBounds | null;
  performance: CropPerformance;
}

export interface StabilizationStats {
  mode: "temporal";
  totalDetected: number;
  totalConfirmed: number;
  totalIgnored: number;
  totalRemoved: number;
  activeTracks: number;
  tracksByClass: Record<string, number>;
  confirmRatio: number;
}

export type StabilizerStats = StabilizationStats | { mode: "none" };
