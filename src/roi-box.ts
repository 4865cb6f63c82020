// ROI Stabilizer - ROI box geometry
// Pure shape algebra for square crop regions: expansion, temporal smoothing
// and normalization to a square multiple of the model input size.
//
// Boxes are immutable; every operation returns a new RoiBox. Degenerate input
// (zero-size boxes, empty frames) produces zero-area results instead of errors.

import type { BoundingBox, FrameShape, RoiBounds } from "./types.js";

// ─── Helpers ────────────────────────────────────────────────────────────────────

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/**
 * Round to the nearest integer, ties to even (2.5 → 2, 3.5 → 4).
 * Keeps the multiple selection stable for sides that sit exactly between two multiples.
 */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const diff = value - floor;
  if (diff > 0.5) return floor + 1;
  if (diff < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

/**
 * Place a square of `side` pixels with its top-left corner at (x1, y1),
 * translated back inside the frame when one is given.
 * Callers guarantee `side <= min(frame.width, frame.height)`.
 */
function placeSquare(x1: number, y1: number, side: number, frame?: FrameShape): RoiBox {
  if (frame) {
    x1 = clamp(x1, 0, frame.width - side);
    y1 = clamp(y1, 0, frame.height - side);
  }
  return new RoiBox(x1, y1, x1 + side, y1 + side);
}

// ─── RoiBox ─────────────────────────────────────────────────────────────────────

export class RoiBox {
  readonly x1: number;
  readonly y1: number;
  readonly x2: number;
  readonly y2: number;

  constructor(x1: number, y1: number, x2: number, y2: number) {
    this.x1 = x1;
    this.y1 = y1;
    this.x2 = x2;
    this.y2 = y2;
  }

  /**
   * Smallest integer box enclosing every detection (center + size form).
   * Corners are truncated toward zero. Returns null for an empty list.
   */
  static enclosing(boxes: readonly BoundingBox[]): RoiBox | null {
    if (boxes.length === 0) return null;

    let minX = Infinity;
    let minY = Infinity;
    let maxX = -Infinity;
    let maxY = -Infinity;
    for (const b of boxes) {
      minX = Math.min(minX, b.x - b.width / 2);
      minY = Math.min(minY, b.y - b.height / 2);
      maxX = Math.max(maxX, b.x + b.width / 2);
      maxY = Math.max(maxY, b.y + b.height / 2);
    }

    return new RoiBox(Math.trunc(minX), Math.trunc(minY), Math.trunc(maxX), Math.trunc(maxY));
  }

  get width(): number {
    return this.x2 - this.x1;
  }

  get height(): number {
    return this.y2 - this.y1;
  }

  get area(): number {
    return this.width * this.height;
  }

  get isSquare(): boolean {
    return this.width === this.height;
  }

  /** Largest side relative to the model input size (2 for a 640px box at imgsz=320). */
  sizeMultiple(imgsz: number): number {
    return imgsz > 0 ? Math.max(this.width, this.height) / imgsz : 0;
  }

  /** Fraction of the frame area covered by this box. */
  cropRatio(frame: FrameShape): number {
    const frameArea = frame.height * frame.width;
    return frameArea > 0 ? this.area / frameArea : 0;
  }

  /**
   * Grow by `margin` (fraction of the frame dimension) on every side.
   *
   * Rectangular boxes are clipped to the frame. With `preserveSquare` and a
   * square input, the larger of the two margins is used on both axes and the
   * square is translated back inside the frame, so the result stays square.
   * Its side is capped at the frame's shorter dimension.
   */
  expand(margin: number, frame: FrameShape, preserveSquare: boolean = false): RoiBox {
    let marginX = Math.trunc(margin * frame.width);
    let marginY = Math.trunc(margin * frame.height);

    if (preserveSquare && this.isSquare) {
      const marginPx = Math.max(marginX, marginY);
      const side = Math.min(this.width + 2 * marginPx, frame.width, frame.height);
      const grow = side - this.width;
      return placeSquare(
        this.x1 - Math.floor(grow / 2),
        this.y1 - Math.floor(grow / 2),
        side,
        frame,
      );
    }

    return new RoiBox(
      clamp(this.x1 - marginX, 0, frame.width),
      clamp(this.y1 - marginY, 0, frame.height),
      clamp(this.x2 + marginX, 0, frame.width),
      clamp(this.y2 + marginY, 0, frame.height),
    );
  }

  /**
   * Temporal smoothing: `alpha * other + (1 - alpha) * this` per corner, truncated.
   * alpha = 0 keeps this box, alpha = 1 adopts `other`.
   *
   * When both inputs are square and truncation breaks squareness, the result is
   * re-centered with the larger side on both axes (and moved inside `frame` when given).
   */
  smoothWith(other: RoiBox, alpha: number, frame?: FrameShape): RoiBox {
    // same value as alpha * next + (1 - alpha) * self, but exact when next === self
    const lerp = (self: number, next: number) => Math.trunc(self + alpha * (next - self));
    const smoothed = new RoiBox(
      lerp(this.x1, other.x1),
      lerp(this.y1, other.y1),
      lerp(this.x2, other.x2),
      lerp(this.y2, other.y2),
    );

    if (!this.isSquare || !other.isSquare || smoothed.isSquare) {
      return smoothed;
    }

    let side = Math.max(smoothed.width, smoothed.height);
    if (frame) side = Math.min(side, frame.width, frame.height);
    const centerX = Math.floor((smoothed.x1 + smoothed.x2) / 2);
    const centerY = Math.floor((smoothed.y1 + smoothed.y2) / 2);
    const half = Math.floor(side / 2);
    return placeSquare(centerX - half, centerY - half, side, frame);
  }

  /**
   * Normalize to a square whose side is an integer multiple of `imgsz`.
   *
   * 1. Take the larger side and divide by imgsz
   * 2. Round to the nearest multiple, clamp to [minMultiple, maxMultiple]
   * 3. Cap at the largest multiple that fits the frame's shorter side
   * 4. Center on the original box, then translate into the frame
   *
   * Near the frame edges the square keeps its size and gives up centering.
   * Only when even `minMultiple * imgsz` does not fit is the side reduced to
   * the frame's shorter dimension.
   *
   * Example: 450×300 at imgsz=320 → 1.4 → 1 → 320×320
   */
  makeSquareMultiple(
    imgsz: number,
    minMultiple: number,
    maxMultiple: number,
    frame: FrameShape,
  ): RoiBox {
    const maxSide = Math.max(this.width, this.height);
    let multiple = clamp(roundHalfEven(maxSide / imgsz), minMultiple, maxMultiple);

    const shorterSide = Math.min(frame.width, frame.height);
    const fittingMultiple = Math.floor(shorterSide / imgsz);
    if (multiple > fittingMultiple) {
      multiple = Math.max(minMultiple, fittingMultiple);
    }

    const side = Math.min(multiple * imgsz, shorterSide);
    const centerX = Math.floor((this.x1 + this.x2) / 2);
    const centerY = Math.floor((this.y1 + this.y2) / 2);
    const half = Math.floor(side / 2);

    return placeSquare(centerX - half, centerY - half, side, frame);
  }

  toBounds(): RoiBounds {
    return {
      x1: this.x1,
      y1: this.y1,
      x2: this.x2,
      y2: this.y2,
      width: this.width,
      height: this.height,
      area: this.area,
      isSquare: this.isSquare,
    };
  }

  toString(): string {
    return `(${this.x1},${this.y1})-(${this.x2},${this.y2}) [${this.width}×${this.height}]`;
  }
}
