// ROI Stabilizer - Public API
// Adaptive/fixed region-of-interest cropping and temporal detection
// stabilization for per-frame object detection pipelines.

export const APP_NAME = "ROI Stabilizer";
export const APP_VERSION = "0.1.0";

export { RoiBox, roundHalfEven } from "./roi-box.js";
export {
  AdaptiveRoiState,
  FixedRoiState,
  DEFAULT_ADAPTIVE_ROI_CONFIG,
  DEFAULT_FIXED_ROI_CONFIG,
  DEFAULT_IMGSZ,
  validateAdaptiveRoiConfig,
  validateFixedRoiConfig,
  validateImgsz,
} from "./roi-state.js";
export type { RoiStateOptions, RoiStrategy } from "./roi-state.js";
export { createRoiStrategy } from "./roi-strategy.js";

export {
  buildCropMetadata,
  createImage,
  cropFrameIfRoi,
  cropView,
  frameShapeOf,
  pixelAt,
  resizeBilinear,
  transformDetections,
} from "./frame-crop.js";
export type { CropOptions, CropResult, ImageView, VideoFrame } from "./frame-crop.js";

export {
  CLASS_ONLY_THRESHOLD,
  HierarchicalMatcher,
  classOnlyStrategy,
  computeIou,
  iouStrategy,
  scoreMatch,
} from "./matching.js";
export type {
  HierarchicalMatcherOptions,
  MatchResult,
  MatchingStrategy,
  MatchingStrategyKind,
  TrackedBox,
} from "./matching.js";

export { ConfidenceHistory, DEFAULT_CONFIDENCE_HISTORY_SIZE } from "./confidence-history.js";
export { DetectionTrack, TrackState } from "./detection-track.js";
export {
  assertValidDetections,
  parseDetection,
  parseDetections,
  parseFrameShape,
} from "./detection-validation.js";

export {
  DEFAULT_STABILIZATION_CONFIG,
  NoOpStabilizer,
  TemporalHysteresisStabilizer,
  createStabilizer,
  validateTemporalConfig,
} from "./stabilizer.js";
export type {
  DetectionStabilizer,
  TemporalStabilizerConfig,
  TemporalStabilizerOptions,
} from "./stabilizer.js";

export { FrameProcessor, createFrameProcessor } from "./frame-processor.js";
export type {
  ControlCommand,
  FrameProcessorOptions,
  FrameResult,
  InferenceResult,
  PredictionResult,
  RunModel,
} from "./frame-processor.js";

export { loadConfig, readBoolean, readInteger, readNumber } from "./config.js";
export {
  formatReplayOutput,
  parseReplayLine,
  parseReplayStream,
  replayFile,
  replayRecords,
} from "./replay.js";
export type { ReplayOutput, ReplayRecord } from "./replay.js";

export { createConsoleLogger, silentLogger } from "./logger.js";
export type { ConsoleLoggerOptions, Logger } from "./logger.js";

export type * from "./types.js";
