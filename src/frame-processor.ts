/**
 * FrameProcessor: per-frame orchestration called by the inference runtime.
 *
 * For each frame of a source:
 *   infer():        ROI → crop → model callback → coordinates back to full frame
 *   onPrediction(): ROI update from the raw detections (feedback for the next frame),
 *                   then stabilization of the same detections
 *
 * Control (enable/disable the adaptive ROI, reset a source) arrives as messages
 * through send(); they are applied at the start of the next call, so all state
 * is only ever mutated from the frame-processing call itself.
 */

import {
  buildCropMetadata,
  cropFrameIfRoi,
  frameShapeOf,
  transformDetections,
  type VideoFrame,
} from "./frame-crop.js";
import { assertValidDetections } from "./detection-validation.js";
import type { RoiBox } from "./roi-box.js";
import type { RoiStrategy } from "./roi-state.js";
import { createRoiStrategy } from "./roi-strategy.js";
import { createStabilizer, type DetectionStabilizer } from "./stabilizer.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import type {
  AppConfig,
  CropMetadata,
  Detection,
  FrameShape,
  StabilizedDetection,
  StabilizerStats,
} from "./types.js";

// ─── Control Messages ───────────────────────────────────────────────────────────

export type ControlCommand =
  | { type: "enable-roi" }
  | { type: "disable-roi" }
  | { type: "toggle-roi" }
  | { type: "reset"; sourceId?: number };

// ─── Results ────────────────────────────────────────────────────────────────────

/** Synchronous model call on the (possibly cropped) frame. */
export type RunModel = (frame: VideoFrame) => Detection[];

export interface InferenceResult {
  /** Raw model detections in full-frame coordinates */
  detections: Detection[];
  /** Present when statistics are enabled */
  cropMetadata: CropMetadata | null;
}

export interface PredictionResult {
  detections: StabilizedDetection[];
  stats: StabilizerStats;
  /** Box that will crop the next frame of this source */
  nextRoi: RoiBox | null;
}

export interface FrameResult extends PredictionResult {
  rawDetections: Detection[];
  cropMetadata: CropMetadata | null;
}

export interface FrameProcessorOptions {
  /** ROI strategy, or null to always infer on the full frame */
  roi: RoiStrategy | null;
  stabilizer: DetectionStabilizer;
  /** Attach crop metadata to inference results. Default: true */
  showStatistics?: boolean;
  logger?: Logger;
}

// ─── FrameProcessor ─────────────────────────────────────────────────────────────

export class FrameProcessor {
  readonly roi: RoiStrategy | null;
  readonly stabilizer: DetectionStabilizer;
  private showStatistics: boolean;
  private logger: Logger;
  private roiActive: boolean;
  private inbox: ControlCommand[];
  private zoomLoggedSources: Set<number>;

  constructor(options: FrameProcessorOptions) {
    this.roi = options.roi;
    this.stabilizer = options.stabilizer;
    this.showStatistics = options.showStatistics ?? true;
    this.logger = options.logger ?? createConsoleLogger("FrameProcessor");
    this.roiActive = true;
    this.inbox = [];
    this.zoomLoggedSources = new Set();
  }

  /** Whether crops are currently applied (always false without an ROI strategy). */
  get roiEnabled(): boolean {
    return this.roi !== null && this.roiActive;
  }

  get pendingCommands(): number {
    return this.inbox.length;
  }

  /**
   * Queue a control command for the next frame call.
   * Throws when the ROI strategy cannot be toggled (fixed or none).
   */
  send(command: ControlCommand): void {
    if (command.type !== "reset" && !this.roi?.supportsToggle) {
      throw new Error(
        `ROI strategy '${this.roi?.kind ?? "none"}' does not support enable/disable (command: ${command.type})`,
      );
    }
    this.inbox.push(command);
  }

  /** Crop, run the model, and map detections back into full-frame coordinates. */
  infer(frame: VideoFrame, runModel: RunModel): InferenceResult {
    this.drainCommands();

    const frameShape = frameShapeOf(frame.image);
    const roi = this.roi !== null && this.roiActive ? this.roi.getRoi(frame.sourceId, frameShape) : null;

    const crop = cropFrameIfRoi(frame, roi, {
      modelSize: this.roi?.imgsz ?? null,
      resizeToModel: this.roi?.resizeToModel ?? false,
      logger: this.logger,
    });

    if (crop.zoom && !this.zoomLoggedSources.has(frame.sourceId)) {
      this.zoomLoggedSources.add(frame.sourceId);
      this.logger.info(
        `Zoom applied (source ${frame.sourceId}): ROI ${crop.zoom.from}×${crop.zoom.from} → ${crop.zoom.to}×${crop.zoom.to}`,
      );
    }

    const detections = transformDetections(runModel(crop.frame), crop.offset);
    const cropMetadata = this.showStatistics
      ? buildCropMetadata(roi, frameShape, this.roi?.imgsz ?? null, this.roiEnabled, crop.offset)
      : null;

    return { detections, cropMetadata };
  }

  /**
   * Feed one frame's full-frame detections: update the ROI used for the next
   * frame of this source, then stabilize.
   */
  onPrediction(sourceId: number, detections: Detection[], frameShape: FrameShape): PredictionResult {
    this.drainCommands();
    assertValidDetections(detections);

    if (this.roi !== null && this.roiActive) {
      this.roi.updateFromDetections(sourceId, detections, frameShape);
    }

    const stabilized = this.stabilizer.process(detections, sourceId);

    return {
      detections: stabilized,
      stats: this.stabilizer.getStats(sourceId),
      nextRoi: this.roi !== null && this.roiActive ? this.roi.getRoi(sourceId, frameShape) : null,
    };
  }

  /** infer() followed by onPrediction() for the same frame. */
  processFrame(frame: VideoFrame, runModel: RunModel): FrameResult {
    const inference = this.infer(frame, runModel);
    const prediction = this.onPrediction(frame.sourceId, inference.detections, frameShapeOf(frame.image));
    return {
      ...prediction,
      rawDetections: inference.detections,
      cropMetadata: inference.cropMetadata,
    };
  }

  private drainCommands(): void {
    while (this.inbox.length > 0) {
      const command = this.inbox.shift();
      if (command) this.apply(command);
    }
  }

  private apply(command: ControlCommand): void {
    switch (command.type) {
      case "enable-roi":
        this.setRoiActive(true);
        break;
      case "disable-roi":
        this.setRoiActive(false);
        break;
      case "toggle-roi":
        this.setRoiActive(!this.roiActive);
        break;
      case "reset":
        this.roi?.reset(command.sourceId);
        this.stabilizer.reset(command.sourceId);
        break;
    }
  }

  private setRoiActive(active: boolean): void {
    if (active === this.roiActive) return;
    this.roiActive = active;
    if (active) {
      this.logger.info("Adaptive ROI enabled");
    } else {
      this.roi?.reset();
      this.logger.info("Adaptive ROI disabled (reset to full frame)");
    }
  }
}

// ─── Factory ────────────────────────────────────────────────────────────────────

/** Build the ROI strategy and stabilizer from validated config and wire them together. */
export function createFrameProcessor(config: AppConfig, logger?: Logger): FrameProcessor {
  return new FrameProcessor({
    roi: createRoiStrategy(config.roi, logger),
    stabilizer: createStabilizer(config.stabilization, logger),
    showStatistics: config.roi.showStatistics,
    logger,
  });
}
