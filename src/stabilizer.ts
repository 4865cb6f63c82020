// ROI Stabilizer - Detection stabilization (temporal filtering + confidence hysteresis)
//
// Turns flickering per-frame detections into a stable stream:
//   1. Appear threshold (strict): a new object needs confidence >= appearConf
//   2. Temporal confirmation: minFrames consecutive qualifying frames
//   3. Persist threshold (relaxed): confirmed tracks only need persistConf
//   4. Gap tolerance: up to maxGap missed frames before eviction
//
// Example (minFrames=3, maxGap=2, appear=0.5, persist=0.3):
//   Frame 1: person 0.45 → ignored (< 0.5 appear)
//   Frame 2: person 0.52 → tracking (1/3)
//   Frame 3: person 0.55 → tracking (2/3)
//   Frame 4: person 0.51 → confirmed, emitted
//   Frame 5: person 0.35 → emitted (>= 0.3 persist, confirmed)
//   Frame 6: nothing     → gap 1/2
//   Frame 7: nothing     → gap 2/2
//   Frame 8: nothing     → evicted (gap > maxGap)
//
// Eviction counts frames, not wall-clock time, so a recorded detection stream
// replays to the same output.

import { DetectionTrack } from "./detection-track.js";
import { assertValidDetections } from "./detection-validation.js";
import { HierarchicalMatcher } from "./matching.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import type {
  Detection,
  StabilizationConfig,
  StabilizationMode,
  StabilizationStats,
  StabilizedDetection,
  StabilizerStats,
} from "./types.js";

// ─── Interface ──────────────────────────────────────────────────────────────────

export interface DetectionStabilizer {
  readonly mode: StabilizationMode;
  /** Stabilize one frame's detections for one source. */
  process(detections: Detection[], sourceId?: number): StabilizedDetection[];
  /** Forget tracks for one source, or for all sources when omitted. */
  reset(sourceId?: number): void;
  getStats(sourceId?: number): StabilizerStats;
}

// ─── Config ─────────────────────────────────────────────────────────────────────

export type TemporalStabilizerConfig = Omit<StabilizationConfig, "mode">;

export const DEFAULT_STABILIZATION_CONFIG: StabilizationConfig = {
  mode: "temporal",
  minFrames: 3,
  maxGap: 2,
  appearConf: 0.5,
  persistConf: 0.3,
  iouThreshold: 0.3,
};

function isUnitInterval(value: number): boolean {
  return Number.isFinite(value) && value >= 0 && value <= 1;
}

/** Throws a descriptive error for the first invalid parameter. Never clamps. */
export function validateTemporalConfig(config: TemporalStabilizerConfig): void {
  if (!Number.isInteger(config.minFrames) || config.minFrames < 1) {
    throw new Error(`minFrames must be an integer >= 1, got ${config.minFrames}`);
  }
  if (!Number.isInteger(config.maxGap) || config.maxGap < 0) {
    throw new Error(`maxGap must be an integer >= 0, got ${config.maxGap}`);
  }
  if (!isUnitInterval(config.appearConf)) {
    throw new Error(`appearConf must be in [0.0, 1.0], got ${config.appearConf}`);
  }
  if (!isUnitInterval(config.persistConf)) {
    throw new Error(`persistConf must be in [0.0, 1.0], got ${config.persistConf}`);
  }
  if (config.persistConf > config.appearConf) {
    throw new Error(`persistConf (${config.persistConf}) must be <= appearConf (${config.appearConf})`);
  }
  if (!isUnitInterval(config.iouThreshold)) {
    throw new Error(`iouThreshold must be in [0.0, 1.0], got ${config.iouThreshold}`);
  }
}

// ─── Temporal + Hysteresis ──────────────────────────────────────────────────────

interface SourceCounters {
  totalDetected: number;
  totalConfirmed: number;
  totalIgnored: number;
  totalRemoved: number;
}

export interface TemporalStabilizerOptions {
  logger?: Logger;
  /** Custom matcher (strategy order / toggles). Default: IoU → class-only */
  matcher?: HierarchicalMatcher;
}

export class TemporalHysteresisStabilizer implements DetectionStabilizer {
  readonly mode = "temporal" as const;
  readonly config: TemporalStabilizerConfig;
  readonly matcher: HierarchicalMatcher;
  private logger: Logger;

  // sourceId → className → tracks (creation order)
  private tracks: Map<number, Map<string, DetectionTrack[]>>;
  private counters: Map<number, SourceCounters>;
  private nextTrackId: number;

  constructor(config: Partial<TemporalStabilizerConfig> = {}, options: TemporalStabilizerOptions = {}) {
    const { mode: _mode, ...defaults } = DEFAULT_STABILIZATION_CONFIG;
    this.config = { ...defaults, ...config };
    validateTemporalConfig(this.config);

    this.logger = options.logger ?? createConsoleLogger("Stabilizer");
    this.matcher =
      options.matcher ?? new HierarchicalMatcher({ iouThreshold: this.config.iouThreshold, logger: this.logger });

    this.tracks = new Map();
    this.counters = new Map();
    this.nextTrackId = 1;

    const { minFrames, maxGap, appearConf, persistConf } = this.config;
    this.logger.info(
      `TemporalHysteresisStabilizer initialized: minFrames=${minFrames}, maxGap=${maxGap}, ` +
        `appearConf=${appearConf.toFixed(2)}, persistConf=${persistConf.toFixed(2)}`,
    );
  }

  /**
   * Match, update, emit, then evict, once per frame.
   *
   * Matching runs against the tracks alive at the start of the frame; tracks
   * created by this frame's detections are neither candidates nor marked missed
   * until the next frame. Detections are not de-duplicated: two near-identical
   * detections are assigned in list order.
   */
  process(detections: Detection[], sourceId: number = 0): StabilizedDetection[] {
    assertValidDetections(detections);

    const { minFrames, maxGap, appearConf, persistConf } = this.config;
    const tracksByClass = this.sourceTracks(sourceId);
    const counters = this.sourceCounters(sourceId);
    counters.totalDetected += detections.length;

    const candidates: DetectionTrack[] = [];
    for (const list of tracksByClass.values()) {
      candidates.push(...list);
    }
    const matched = new Set<number>();

    // 1. Match detections to existing tracks
    for (const detection of detections) {
      const match = this.matcher.findBestMatch(detection, candidates, matched);

      if (match) {
        matched.add(match.index);
        const track = match.track;
        const required = track.confirmed ? persistConf : appearConf;

        if (detection.confidence >= required) {
          track.update(detection);
          if (track.confirmIfReady(minFrames)) {
            counters.totalConfirmed++;
            this.logger.debug(
              `Track ${track.id} confirmed: ${track.className} after ${track.consecutiveFrames} frames ` +
                `(avgConf=${track.avgConfidence.toFixed(2)})`,
            );
          }
        } else {
          track.markMissed();
        }
        continue;
      }

      // 2. Unmatched: start a new track if confident enough
      if (detection.confidence >= appearConf) {
        const track = new DetectionTrack(this.nextTrackId++, detection);
        if (track.confirmIfReady(minFrames)) {
          counters.totalConfirmed++;
        }
        const list = tracksByClass.get(detection.class);
        if (list) {
          list.push(track);
        } else {
          tracksByClass.set(detection.class, [track]);
        }
        this.logger.debug(
          `New track ${track.id}: ${detection.class} conf=${detection.confidence.toFixed(2)} (needs ${minFrames} frames)`,
        );
      } else {
        counters.totalIgnored++;
        this.logger.debug(
          `Ignored detection: ${detection.class} conf=${detection.confidence.toFixed(2)} < ${appearConf.toFixed(2)}`,
        );
      }
    }

    // 3. Tracks nobody claimed this frame
    for (let i = 0; i < candidates.length; i++) {
      if (!matched.has(i)) candidates[i].markMissed();
    }

    // 4. Emit confirmed tracks seen this frame
    const stabilized: StabilizedDetection[] = [];
    for (const list of tracksByClass.values()) {
      for (const track of list) {
        if (track.confirmed && track.gapFrames === 0) {
          stabilized.push(track.toDetection());
        }
      }
    }

    // 5. Evict expired tracks
    for (const [className, list] of tracksByClass) {
      const alive = list.filter((track) => track.gapFrames <= maxGap);
      const removed = list.length - alive.length;
      if (removed > 0) {
        counters.totalRemoved += removed;
        this.logger.debug(`Removed ${removed} expired tracks: ${className} (gap > ${maxGap})`);
      }
      if (alive.length === 0) {
        tracksByClass.delete(className);
      } else {
        tracksByClass.set(className, alive);
      }
    }

    this.logger.debug(
      `Source ${sourceId}: ${detections.length} raw → ${stabilized.length} stabilized ` +
        `(activeTracks=${this.countActive(tracksByClass)})`,
    );

    return stabilized;
  }

  reset(sourceId?: number): void {
    if (sourceId === undefined) {
      this.tracks.clear();
      this.counters.clear();
      this.logger.info("All stabilization tracks reset");
    } else {
      this.tracks.delete(sourceId);
      this.counters.delete(sourceId);
      this.logger.info(`Stabilization tracks reset for source ${sourceId}`);
    }
  }

  getStats(sourceId: number = 0): StabilizationStats {
    const counters = this.counters.get(sourceId) ?? {
      totalDetected: 0,
      totalConfirmed: 0,
      totalIgnored: 0,
      totalRemoved: 0,
    };
    const tracksByClass = this.tracks.get(sourceId) ?? new Map<string, DetectionTrack[]>();

    const byClass: Record<string, number> = {};
    for (const [className, list] of tracksByClass) {
      byClass[className] = list.length;
    }

    return {
      mode: "temporal",
      ...counters,
      activeTracks: this.countActive(tracksByClass),
      tracksByClass: byClass,
      confirmRatio: counters.totalDetected > 0 ? counters.totalConfirmed / counters.totalDetected : 0,
    };
  }

  /** Live tracks for a source, in emission order. Read-only snapshot. */
  getTracks(sourceId: number = 0): readonly DetectionTrack[] {
    const tracksByClass = this.tracks.get(sourceId);
    if (!tracksByClass) return [];
    return [...tracksByClass.values()].flat();
  }

  private sourceTracks(sourceId: number): Map<string, DetectionTrack[]> {
    let tracksByClass = this.tracks.get(sourceId);
    if (!tracksByClass) {
      tracksByClass = new Map();
      this.tracks.set(sourceId, tracksByClass);
    }
    return tracksByClass;
  }

  private sourceCounters(sourceId: number): SourceCounters {
    let counters = this.counters.get(sourceId);
    if (!counters) {
      counters = { totalDetected: 0, totalConfirmed: 0, totalIgnored: 0, totalRemoved: 0 };
      this.counters.set(sourceId, counters);
    }
    return counters;
  }

  private countActive(tracksByClass: Map<string, DetectionTrack[]>): number {
    let total = 0;
    for (const list of tracksByClass.values()) total += list.length;
    return total;
  }
}

// ─── No-op ──────────────────────────────────────────────────────────────────────

/** Pass-through baseline: detections are returned untouched. */
export class NoOpStabilizer implements DetectionStabilizer {
  readonly mode = "none" as const;

  process(detections: Detection[], _sourceId?: number): StabilizedDetection[] {
    return detections;
  }

  reset(_sourceId?: number): void {
    // nothing tracked
  }

  getStats(_sourceId?: number): StabilizerStats {
    return { mode: "none" };
  }
}

// ─── Factory ────────────────────────────────────────────────────────────────────

/** Validate the config and build the stabilizer for `config.mode`. */
export function createStabilizer(
  config: StabilizationConfig,
  logger: Logger = createConsoleLogger("Stabilizer"),
): DetectionStabilizer {
  const mode = config.mode.toLowerCase();

  if (mode === "none") {
    logger.info("Stabilization: NONE (baseline, no filtering)");
    return new NoOpStabilizer();
  }

  if (mode === "temporal") {
    const { mode: _mode, ...temporal } = config;
    return new TemporalHysteresisStabilizer(temporal, { logger });
  }

  throw new Error(`Invalid stabilization mode: '${config.mode}'. Must be one of: none, temporal`);
}
