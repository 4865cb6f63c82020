/**
 * Bounded confidence history for one track.
 * Circular buffer: once full, each push overwrites the oldest value. O(1) push.
 */

export const DEFAULT_CONFIDENCE_HISTORY_SIZE = 10;

export class ConfidenceHistory {
  private buffer: Float64Array;
  private head: number; // index of the oldest value
  private tail: number; // index of the next write position
  private count: number;
  private maxSize: number;

  constructor(maxSize: number = DEFAULT_CONFIDENCE_HISTORY_SIZE) {
    if (!Number.isInteger(maxSize) || maxSize < 1) {
      throw new Error(`ConfidenceHistory size must be an integer >= 1, got ${maxSize}`);
    }
    this.maxSize = maxSize;
    this.buffer = new Float64Array(maxSize);
    this.head = 0;
    this.tail = 0;
    this.count = 0;
  }

  /** Append a confidence, evicting the oldest one when full. */
  push(confidence: number): void {
    if (this.count === this.maxSize) {
      this.head = (this.head + 1) % this.maxSize;
      this.count--;
    }

    this.buffer[this.tail] = confidence;
    this.tail = (this.tail + 1) % this.maxSize;
    this.count++;
  }

  /** Mean of the retained values, or null when empty. */
  average(): number | null {
    if (this.count === 0) return null;
    let total = 0;
    for (let i = 0; i < this.count; i++) {
      total += this.buffer[(this.head + i) % this.maxSize];
    }
    return total / this.count;
  }

  /** Retained values, oldest first. */
  toArray(): number[] {
    const values: number[] = [];
    for (let i = 0; i < this.count; i++) {
      values.push(this.buffer[(this.head + i) % this.maxSize]);
    }
    return values;
  }

  get size(): number {
    return this.count;
  }

  get capacity(): number {
    return this.maxSize;
  }

  clear(): void {
    this.buffer.fill(0);
    this.head = 0;
    this.tail = 0;
    this.count = 0;
  }
}
