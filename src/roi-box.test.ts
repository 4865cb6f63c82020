/**
 * Unit tests for roi-box.ts
 */

import { describe, it, expect } from "vitest";
import { RoiBox, roundHalfEven } from "./roi-box.js";

// 1080p landscape frame
const FULL_HD = { height: 1080, width: 1920 };

describe("roundHalfEven", () => {
  it("rounds ties to the even neighbour", () => {
    expect(roundHalfEven(0.5)).toBe(0);
    expect(roundHalfEven(1.5)).toBe(2);
    expect(roundHalfEven(2.5)).toBe(2);
    expect(roundHalfEven(3.5)).toBe(4);
  });

  it("rounds non-ties to the nearest integer", () => {
    expect(roundHalfEven(1.4)).toBe(1);
    expect(roundHalfEven(1.6)).toBe(2);
    expect(roundHalfEven(6.25)).toBe(6);
    expect(roundHalfEven(0)).toBe(0);
  });
});

describe("RoiBox", () => {
  describe("derived properties", () => {
    it("computes width, height, area and squareness from corners", () => {
      const box = new RoiBox(10, 20, 110, 70);
      expect(box.width).toBe(100);
      expect(box.height).toBe(50);
      expect(box.area).toBe(5000);
      expect(box.isSquare).toBe(false);
      expect(new RoiBox(0, 0, 64, 64).isSquare).toBe(true);
    });

    it("reports the size multiple of the larger side", () => {
      expect(new RoiBox(0, 0, 640, 480).sizeMultiple(320)).toBe(2);
      expect(new RoiBox(0, 0, 640, 480).sizeMultiple(0)).toBe(0);
    });

    it("reports the covered fraction of the frame", () => {
      expect(new RoiBox(0, 0, 960, 540).cropRatio(FULL_HD)).toBe(0.25);
      expect(new RoiBox(0, 0, 10, 10).cropRatio({ height: 0, width: 0 })).toBe(0);
    });

    it("formats as corners plus size", () => {
      expect(new RoiBox(1, 2, 321, 322).toString()).toBe("(1,2)-(321,322) [320×320]");
    });

    it("converts to plain bounds", () => {
      expect(new RoiBox(0, 0, 320, 320).toBounds()).toEqual({
        x1: 0,
        y1: 0,
        x2: 320,
        y2: 320,
        width: 320,
        height: 320,
        area: 102400,
        isSquare: true,
      });
    });
  });

  describe("enclosing", () => {
    it("returns null for no boxes", () => {
      expect(RoiBox.enclosing([])).toBeNull();
    });

    it("encloses every center + size box, truncating corners", () => {
      const box = RoiBox.enclosing([
        { x: 100, y: 100, width: 50, height: 40 },
        { x: 300.7, y: 220.3, width: 20, height: 20 },
      ]);
      // corners: (75, 80)-(125, 120) and (290.7, 210.3)-(310.7, 230.3)
      expect(box).toEqual(new RoiBox(75, 80, 310, 230));
    });
  });

  describe("makeSquareMultiple", () => {
    it("turns a 450×300 box into one 320 square", () => {
      const box = new RoiBox(0, 0, 450, 300).makeSquareMultiple(320, 1, 4, FULL_HD);
      // centered at (225, 150), pushed down to y = 0
      expect(box).toEqual(new RoiBox(65, 0, 385, 320));
    });

    it("raises a tiny box to the minimum multiple and moves it inside the frame", () => {
      const box = new RoiBox(10, 20, 100, 80).makeSquareMultiple(320, 1, 4, FULL_HD);
      expect(box).toEqual(new RoiBox(0, 0, 320, 320));
    });

    it("keeps the full side near the bottom-right corner", () => {
      const box = new RoiBox(1700, 900, 1900, 1050).makeSquareMultiple(320, 1, 4, FULL_HD);
      expect(box).toEqual(new RoiBox(1600, 760, 1920, 1080));
    });

    it("clamps the multiple to maxMultiple", () => {
      const box = new RoiBox(0, 0, 2000, 2000).makeSquareMultiple(320, 1, 4, { height: 3000, width: 3000 });
      expect(box).toEqual(new RoiBox(360, 360, 1640, 1640));
      expect(box.width).toBe(4 * 320);
    });

    it("rounds an exact half multiple to the even one", () => {
      // 800 / 320 = 2.5 → 2
      const box = new RoiBox(0, 0, 800, 800).makeSquareMultiple(320, 1, 4, FULL_HD);
      expect(box).toEqual(new RoiBox(80, 80, 720, 720));
    });

    it("caps the multiple at what fits the shorter frame side", () => {
      // 1120 / 320 = 3.5 → 4, but only 3 × 320 fits in 1080 rows
      const box = new RoiBox(0, 0, 1120, 1120).makeSquareMultiple(320, 1, 4, FULL_HD);
      expect(box).toEqual(new RoiBox(80, 80, 1040, 1040));
    });

    it("shrinks to the shorter frame side when even the minimum multiple does not fit", () => {
      const box = new RoiBox(100, 50, 150, 100).makeSquareMultiple(320, 1, 4, { height: 200, width: 300 });
      expect(box).toEqual(new RoiBox(25, 0, 225, 200));
    });
  });

  describe("expand", () => {
    it("clips a rectangular box to the frame", () => {
      const box = new RoiBox(100, 100, 300, 200).expand(0.1, FULL_HD);
      expect(box).toEqual(new RoiBox(0, 0, 492, 308));
    });

    it("keeps a square square using the larger margin", () => {
      const box = new RoiBox(500, 500, 600, 600).expand(0.1, FULL_HD, true);
      // margins 192 (x) and 108 (y); 192 on every side
      expect(box).toEqual(new RoiBox(308, 308, 792, 792));
    });

    it("translates a grown square back inside the frame", () => {
      const box = new RoiBox(100, 100, 200, 200).expand(0.2, FULL_HD, true);
      expect(box).toEqual(new RoiBox(0, 0, 868, 868));
    });

    it("caps a grown square at the shorter frame side", () => {
      const box = new RoiBox(400, 100, 1000, 700).expand(0.5, FULL_HD, true);
      expect(box.width).toBe(1080);
      expect(box.isSquare).toBe(true);
      expect(box.y1).toBe(0);
      expect(box.y2).toBe(1080);
    });

    it("leaves the box unchanged with a zero margin", () => {
      expect(new RoiBox(500, 500, 600, 600).expand(0, FULL_HD, true)).toEqual(new RoiBox(500, 500, 600, 600));
    });
  });

  describe("smoothWith", () => {
    const a = new RoiBox(0, 0, 100, 100);
    const b = new RoiBox(100, 100, 300, 300);

    it("interpolates corners linearly", () => {
      expect(a.smoothWith(b, 0.5)).toEqual(new RoiBox(50, 50, 200, 200));
    });

    it("returns this box at alpha = 0 and the other at alpha = 1", () => {
      expect(a.smoothWith(b, 0)).toEqual(a);
      expect(a.smoothWith(b, 1)).toEqual(b);
    });

    it("re-squares a result that truncation made rectangular", () => {
      const prev = new RoiBox(1, 0, 12, 11);
      // raw: (0, 0)-(11, 10), 11×10
      const smoothed = new RoiBox(0, 0, 10, 10).smoothWith(prev, 0.5);
      expect(smoothed).toEqual(new RoiBox(0, 0, 11, 11));
    });

    it("does not force squareness for rectangular inputs", () => {
      const smoothed = new RoiBox(0, 0, 10, 20).smoothWith(new RoiBox(0, 0, 20, 20), 0.5);
      expect(smoothed).toEqual(new RoiBox(0, 0, 15, 20));
    });
  });
});
