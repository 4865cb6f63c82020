/**
 * Unit tests for matching.ts
 */

import { describe, it, expect } from "vitest";
import {
  CLASS_ONLY_THRESHOLD,
  HierarchicalMatcher,
  classOnlyStrategy,
  computeIou,
  iouStrategy,
  scoreMatch,
  type TrackedBox,
} from "./matching.js";
import { silentLogger } from "./logger.js";
import type { Detection } from "./types.js";

// ─── Helpers ────────────────────────────────────────────────────────────────────

function makeDetection(x: number, y: number, cls: string = "person"): Detection {
  return { class: cls, confidence: 0.8, x, y, width: 10, height: 10 };
}

function makeTrack(x: number, y: number, className: string = "person"): TrackedBox {
  return { className, x, y, width: 10, height: 10 };
}

// ─── IoU ────────────────────────────────────────────────────────────────────────

describe("computeIou", () => {
  it("is 1 for identical boxes", () => {
    const box = { x: 0.25, y: 0.5, width: 0.15, height: 0.2 };
    expect(computeIou(box, box)).toBe(1);
  });

  it("is 0 for disjoint boxes", () => {
    expect(computeIou({ x: 0, y: 0, width: 10, height: 10 }, { x: 100, y: 100, width: 10, height: 10 })).toBe(0);
  });

  it("computes partial overlap", () => {
    // 10×10 boxes offset by 5 on x: intersection 50, union 150
    expect(computeIou({ x: 0, y: 0, width: 10, height: 10 }, { x: 5, y: 0, width: 10, height: 10 })).toBeCloseTo(
      1 / 3,
      10,
    );
  });

  it("is 0 for zero-area boxes", () => {
    const point = { x: 5, y: 5, width: 0, height: 0 };
    expect(computeIou(point, point)).toBe(0);
  });

  it("is 0 for boxes that only touch at an edge", () => {
    expect(computeIou({ x: 0, y: 0, width: 10, height: 10 }, { x: 10, y: 0, width: 10, height: 10 })).toBe(0);
  });
});

// ─── Strategies ─────────────────────────────────────────────────────────────────

describe("strategies", () => {
  it("iou scores zero across classes", () => {
    expect(scoreMatch(iouStrategy(), makeDetection(0, 0, "car"), makeTrack(0, 0, "person"))).toBe(0);
  });

  it("iou scores the overlap within a class", () => {
    expect(scoreMatch(iouStrategy(), makeDetection(0, 0), makeTrack(0, 0))).toBe(1);
  });

  it("class-only ignores position", () => {
    const strategy = classOnlyStrategy();
    expect(strategy.threshold).toBe(CLASS_ONLY_THRESHOLD);
    expect(scoreMatch(strategy, makeDetection(0, 0), makeTrack(500, 500))).toBe(1);
    expect(scoreMatch(strategy, makeDetection(0, 0, "car"), makeTrack(0, 0))).toBe(0);
  });

  it("rejects an IoU threshold outside [0, 1]", () => {
    expect(() => iouStrategy(1.5)).toThrow("IoU threshold must be in [0.0, 1.0], got 1.5");
  });
});

// ─── Hierarchical Matcher ───────────────────────────────────────────────────────

describe("HierarchicalMatcher", () => {
  it("returns null without tracks", () => {
    const matcher = new HierarchicalMatcher({ logger: silentLogger });
    expect(matcher.findBestMatch(makeDetection(0, 0), [], new Set())).toBeNull();
  });

  it("prefers the overlapping track via IoU", () => {
    const matcher = new HierarchicalMatcher({ logger: silentLogger });
    const tracks = [makeTrack(500, 500), makeTrack(2, 0)];
    const match = matcher.findBestMatch(makeDetection(0, 0), tracks, new Set());

    expect(match?.index).toBe(1);
    expect(match?.strategy).toBe("iou");
    expect(match?.track).toBe(tracks[1]);
  });

  it("falls back to class-only when nothing overlaps", () => {
    const matcher = new HierarchicalMatcher({ logger: silentLogger });
    const tracks = [makeTrack(0, 0, "car"), makeTrack(500, 500)];
    const match = matcher.findBestMatch(makeDetection(0, 0), tracks, new Set());

    expect(match?.index).toBe(1);
    expect(match?.strategy).toBe("class-only");
    expect(match?.score).toBe(1);
  });

  it("keeps the lowest index on ties", () => {
    const matcher = new HierarchicalMatcher({ logger: silentLogger });
    const match = matcher.findBestMatch(makeDetection(0, 0), [makeTrack(0, 0), makeTrack(0, 0)], new Set());
    expect(match?.index).toBe(0);
  });

  it("skips tracks already matched this frame", () => {
    const matcher = new HierarchicalMatcher({ logger: silentLogger });
    const tracks = [makeTrack(0, 0), makeTrack(400, 400)];
    const match = matcher.findBestMatch(makeDetection(0, 0), tracks, new Set([0]));

    expect(match?.index).toBe(1);
    expect(match?.strategy).toBe("class-only");
  });

  it("returns null when every candidate is already matched", () => {
    const matcher = new HierarchicalMatcher({ logger: silentLogger });
    expect(matcher.findBestMatch(makeDetection(0, 0), [makeTrack(0, 0)], new Set([0]))).toBeNull();
  });

  it("ignores IoU below the threshold", () => {
    const matcher = new HierarchicalMatcher({ strategies: [iouStrategy(0.5)], logger: silentLogger });
    // IoU 1/3 with a 5 px shift
    expect(matcher.findBestMatch(makeDetection(0, 0), [makeTrack(5, 0)], new Set())).toBeNull();
  });

  it("skips disabled strategies", () => {
    const matcher = new HierarchicalMatcher({ logger: silentLogger });
    matcher.setStrategyEnabled("class-only", false);

    expect(matcher.findBestMatch(makeDetection(0, 0), [makeTrack(500, 500)], new Set())).toBeNull();

    matcher.setStrategyEnabled("class-only", true);
    expect(matcher.findBestMatch(makeDetection(0, 0), [makeTrack(500, 500)], new Set())?.strategy).toBe(
      "class-only",
    );
  });

  it("uses the configured IoU threshold for the default strategy list", () => {
    const matcher = new HierarchicalMatcher({ iouThreshold: 0.7, logger: silentLogger });
    expect(matcher.strategies.map((s) => [s.kind, s.threshold])).toEqual([
      ["iou", 0.7],
      ["class-only", 0.5],
    ]);
  });
});
