// ROI Stabilizer - Spatial matching between detections and tracks
//
// Strategies are plain tagged records (kind + enabled + threshold); scoring is
// a switch over the kind. The hierarchical matcher tries them in order and the
// first strategy that finds a qualifying track wins.

import { createConsoleLogger, type Logger } from "./logger.js";
import type { BoundingBox, Detection } from "./types.js";

// ─── IoU ────────────────────────────────────────────────────────────────────────

/**
 * Intersection over Union of two center + size boxes.
 * Symmetric, bounded to [0, 1], 1 for identical boxes with positive area,
 * 0 for disjoint boxes and for zero-area unions.
 */
export function computeIou(a: BoundingBox, b: BoundingBox): number {
  const aMinX = a.x - a.width / 2;
  const aMinY = a.y - a.height / 2;
  const aMaxX = a.x + a.width / 2;
  const aMaxY = a.y + a.height / 2;

  const bMinX = b.x - b.width / 2;
  const bMinY = b.y - b.height / 2;
  const bMaxX = b.x + b.width / 2;
  const bMaxY = b.y + b.height / 2;

  const interMinX = Math.max(aMinX, bMinX);
  const interMinY = Math.max(aMinY, bMinY);
  const interMaxX = Math.min(aMaxX, bMaxX);
  const interMaxY = Math.min(aMaxY, bMaxY);

  if (interMaxX < interMinX || interMaxY < interMinY) {
    return 0;
  }

  // areas from the same corners as the intersection, so IoU(a, a) is exactly 1
  const interArea = (interMaxX - interMinX) * (interMaxY - interMinY);
  const areaA = (aMaxX - aMinX) * (aMaxY - aMinY);
  const areaB = (bMaxX - bMinX) * (bMaxY - bMinY);
  const unionArea = areaA + areaB - interArea;
  if (unionArea <= 0) {
    return 0;
  }

  return Math.min(1, Math.max(0, interArea / unionArea));
}

// ─── Strategies ─────────────────────────────────────────────────────────────────

/** Anything a detection can be matched against. */
export interface TrackedBox extends BoundingBox {
  className: string;
}

export type MatchingStrategyKind = "iou" | "class-only";

export interface MatchingStrategy {
  readonly kind: MatchingStrategyKind;
  /** Disabled strategies are skipped by the matcher */
  enabled: boolean;
  /** Minimum score for a valid match */
  readonly threshold: number;
}

export const CLASS_ONLY_THRESHOLD = 0.5;

/** Primary strategy: same class and enough spatial overlap. */
export function iouStrategy(threshold: number = 0.3): MatchingStrategy {
  if (!Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
    throw new Error(`IoU threshold must be in [0.0, 1.0], got ${threshold}`);
  }
  return { kind: "iou", enabled: true, threshold };
}

/**
 * Fallback strategy: same class, position ignored. Catches objects that moved
 * too far between frames for IoU to overlap.
 */
export function classOnlyStrategy(): MatchingStrategy {
  return { kind: "class-only", enabled: true, threshold: CLASS_ONLY_THRESHOLD };
}

/** Similarity in [0, 1] between a detection and a track under one strategy. */
export function scoreMatch(strategy: MatchingStrategy, detection: Detection, track: TrackedBox): number {
  switch (strategy.kind) {
    case "iou":
      if (detection.class !== track.className) return 0;
      return computeIou(detection, track);
    case "class-only":
      return detection.class === track.className ? 1 : 0;
    default: {
      const unknown: never = strategy.kind;
      throw new Error(`Unknown matching strategy: ${String(unknown)}`);
    }
  }
}

// ─── Hierarchical Matcher ───────────────────────────────────────────────────────

export interface MatchResult<T extends TrackedBox> {
  track: T;
  index: number;
  score: number;
  strategy: MatchingStrategyKind;
}

export interface HierarchicalMatcherOptions {
  /** Ordered strategies. Default: [iou(iouThreshold), class-only] */
  strategies?: MatchingStrategy[];
  iouThreshold?: number;
  logger?: Logger;
}

/**
 * Tries each enabled strategy in order; the first one that finds an unmatched
 * track scoring above zero and at least its threshold wins. This is
 * first-match-wins across strategies, not a global optimum.
 */
export class HierarchicalMatcher {
  readonly strategies: MatchingStrategy[];
  private logger: Logger;

  constructor(options: HierarchicalMatcherOptions = {}) {
    this.strategies = options.strategies ?? [iouStrategy(options.iouThreshold ?? 0.3), classOnlyStrategy()];
    this.logger = options.logger ?? createConsoleLogger("HierarchicalMatcher");
    this.logger.debug(`Initialized with strategies: ${this.strategies.map((s) => s.kind).join(" → ")}`);
  }

  /** Enable or disable every strategy of the given kind. */
  setStrategyEnabled(kind: MatchingStrategyKind, enabled: boolean): void {
    for (const strategy of this.strategies) {
      if (strategy.kind === kind) strategy.enabled = enabled;
    }
  }

  /**
   * Best track for `detection` among indices not in `matchedIndices`.
   * Ties keep the lowest index. Returns null when nothing qualifies.
   */
  findBestMatch<T extends TrackedBox>(
    detection: Detection,
    tracks: readonly T[],
    matchedIndices: ReadonlySet<number>,
  ): MatchResult<T> | null {
    if (tracks.length === 0) return null;

    for (const strategy of this.strategies) {
      if (!strategy.enabled) continue;

      let bestIndex = -1;
      let bestScore = 0;

      for (let i = 0; i < tracks.length; i++) {
        if (matchedIndices.has(i)) continue;
        const score = scoreMatch(strategy, detection, tracks[i]);
        if (score > bestScore && score >= strategy.threshold) {
          bestScore = score;
          bestIndex = i;
        }
      }

      if (bestIndex >= 0) {
        this.logger.debug(
          `Match found: ${detection.class} via ${strategy.kind} (score=${bestScore.toFixed(3)})`,
        );
        return { track: tracks[bestIndex], index: bestIndex, score: bestScore, strategy: strategy.kind };
      }
    }

    return null;
  }
}
