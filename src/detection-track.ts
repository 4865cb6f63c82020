// ROI Stabilizer - Track state for one physical object
//
// Lifecycle:
//   TRACKING  → created from a detection at or above appearConf, accumulating frames
//   CONFIRMED → reached minFrames consecutive qualifying frames; never reverts
// Eviction (gapFrames > maxGap) removes the track from the live set; no state is kept.

import { ConfidenceHistory } from "./confidence-history.js";
import type { Detection, StabilizedDetection } from "./types.js";
import type { TrackedBox } from "./matching.js";

export enum TrackState {
  TRACKING = "tracking",
  CONFIRMED = "confirmed",
}

export class DetectionTrack implements TrackedBox {
  readonly id: number;
  readonly className: string;
  confidence: number;
  x: number;
  y: number;
  width: number;
  height: number;
  classId: number | undefined;

  consecutiveFrames: number;
  gapFrames: number;
  private confirmedFlag: boolean;
  readonly confidences: ConfidenceHistory;

  constructor(id: number, detection: Detection, historySize?: number) {
    this.id = id;
    this.className = detection.class;
    this.confidence = detection.confidence;
    this.x = detection.x;
    this.y = detection.y;
    this.width = detection.width;
    this.height = detection.height;
    this.classId = detection.classId;

    this.consecutiveFrames = 1;
    this.gapFrames = 0;
    this.confirmedFlag = false;
    this.confidences = new ConfidenceHistory(historySize);
    this.confidences.push(detection.confidence);
  }

  get confirmed(): boolean {
    return this.confirmedFlag;
  }

  get state(): TrackState {
    return this.confirmedFlag ? TrackState.CONFIRMED : TrackState.TRACKING;
  }

  /** Mean of the recent confidences; the latest confidence when the history is empty. */
  get avgConfidence(): number {
    return this.confidences.average() ?? this.confidence;
  }

  /** Adopt a qualifying detection: position and confidence refreshed, gap cleared. */
  update(detection: Detection): void {
    this.confidence = detection.confidence;
    this.x = detection.x;
    this.y = detection.y;
    this.width = detection.width;
    this.height = detection.height;
    if (detection.classId !== undefined) this.classId = detection.classId;

    this.consecutiveFrames++;
    this.gapFrames = 0;
    this.confidences.push(detection.confidence);
  }

  /** No qualifying detection this frame. */
  markMissed(): void {
    this.consecutiveFrames = 0;
    this.gapFrames++;
  }

  /**
   * Confirm once `consecutiveFrames` reaches `minFrames`.
   * Returns true only on the frame the track becomes confirmed.
   */
  confirmIfReady(minFrames: number): boolean {
    if (this.confirmedFlag || this.consecutiveFrames < minFrames) return false;
    this.confirmedFlag = true;
    return true;
  }

  toDetection(): StabilizedDetection {
    const detection: StabilizedDetection = {
      class: this.className,
      confidence: this.confidence,
      x: this.x,
      y: this.y,
      width: this.width,
      height: this.height,
      stabilization: {
        avgConfidence: this.avgConfidence,
        framesTracked: this.consecutiveFrames,
      },
    };
    if (this.classId !== undefined) detection.classId = this.classId;
    return detection;
  }
}
