/**
 * Fixed-capacity ring buffer of request samples for one endpoint
 *
 * Samples are appended in completion order; once full, each push
 * overwrites the oldest sample. Slots are allocated as samples arrive, up to
 * the capacity.
 */

import type { RequestMetricSample } from '../types/metrics.js';

export class SampleRing {
  private readonly slots: Array<RequestMetricSample | undefined> = [];
  private head = 0; // index of the oldest sample
  private count = 0;

  constructor(public readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`SampleRing capacity must be a positive integer (got ${capacity})`);
    }
  }

  get size(): number {
    return this.count;
  }

  /** Slots allocated so far */
  get allocated(): number {
    return this.slots.length;
  }

  push(sample: RequestMetricSample): void {
    // Never past slots.length: the ring only wraps once every slot exists
    const tail = (this.head + this.count) % this.capacity;
    this.slots[tail] = sample;
    if (this.count < this.capacity) {
      this.count++;
    } else {
      this.head = (this.head + 1) % this.capacity;
    }
  }

  /**
   * Drop samples older than cutoff from the front
   *
   * @returns number of evicted samples
   */
  evictBefore(cutoff: number): number {
    let evicted = 0;
    while (this.count > 0) {
      const oldest = this.slots[this.head];
      if (oldest && oldest.timestamp >= cutoff) {
        break;
      }
      this.slots[this.head] = undefined;
      this.head = (this.head + 1) % this.capacity;
      this.count--;
      evicted++;
    }
    return evicted;
  }

  /**
   * Copy of the samples with timestamp in [from, to], oldest first
   */
  between(from: number, to: number): RequestMetricSample[] {
    const result: RequestMetricSample[] = [];
    for (let i = 0; i < this.count; i++) {
      const sample = this.slots[(this.head + i) % this.capacity];
      if (sample && sample.timestamp >= from && sample.timestamp <= to) {
        result.push(sample);
      }
    }
    return result;
  }

  clear(): void {
    this.slots.length = 0;
    this.head = 0;
    this.count = 0;
  }
}
