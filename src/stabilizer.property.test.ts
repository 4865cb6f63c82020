// Property-Based Tests: temporal stabilization
// Separated objects keep separate tracks, and the order of detections within
// a frame does not change which objects are confirmed.

import { describe, it, expect } from "vitest";
import * as fc from "fast-check";
import { TemporalHysteresisStabilizer } from "./stabilizer.js";
import { silentLogger } from "./logger.js";
import type { Detection } from "./types.js";

// ─── Generators ─────────────────────────────────────────────────────────────────

/** 1-6 same-class objects on a 100 px grid, 10 px wide, so no two overlap. */
const arbitraryObjects = (): fc.Arbitrary<Detection[]> =>
  fc.uniqueArray(fc.integer({ min: 0, max: 19 }), { minLength: 1, maxLength: 6 }).map((cells) =>
    cells.map((cell) => ({
      class: "person",
      confidence: 0.9,
      x: (cell % 5) * 100 + 50,
      y: Math.floor(cell / 5) * 100 + 50,
      width: 10,
      height: 10,
    })),
  );

const arbitraryMinFrames = (): fc.Arbitrary<number> => fc.integer({ min: 1, max: 4 });

function positions(detections: readonly Detection[]): string[] {
  return detections.map((d) => `${d.x},${d.y}`).sort();
}

// ─── Property Tests ─────────────────────────────────────────────────────────────

describe("Property: disjoint objects never merge", () => {
  it("confirms one track per object at the object's own position", () => {
    fc.assert(
      fc.property(arbitraryObjects(), arbitraryMinFrames(), (objects, minFrames) => {
        const stabilizer = new TemporalHysteresisStabilizer({ minFrames }, { logger: silentLogger });

        let output: Detection[] = [];
        for (let i = 0; i < minFrames; i++) {
          output = stabilizer.process(objects);
        }

        expect(stabilizer.getTracks()).toHaveLength(objects.length);
        expect(positions(output)).toEqual(positions(objects));
      }),
      { numRuns: 200 },
    );
  });
});

describe("Property: detection order within a frame does not change the result", () => {
  it("emits the same positions for any permutation of each frame", () => {
    fc.assert(
      fc.property(
        arbitraryObjects().chain((objects) =>
          fc.tuple(
            fc.constant(objects),
            fc.array(fc.shuffledSubarray(objects, { minLength: objects.length, maxLength: objects.length }), {
              minLength: 4,
              maxLength: 4,
            }),
          ),
        ),
        arbitraryMinFrames(),
        ([objects, shuffledFrames], minFrames) => {
          const ordered = new TemporalHysteresisStabilizer({ minFrames }, { logger: silentLogger });
          const shuffled = new TemporalHysteresisStabilizer({ minFrames }, { logger: silentLogger });

          for (const frame of shuffledFrames) {
            const a = ordered.process(objects);
            const b = shuffled.process(frame);
            expect(positions(b)).toEqual(positions(a));
          }
        },
      ),
      { numRuns: 200 },
    );
  });
});
