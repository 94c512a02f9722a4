// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { FanwiseError } from "../exceptions.js";
import type { Zone, ZoneReadings } from "../types.js";

/**
 * Sliding window of raw readings per zone. Oldest samples are evicted first
 * once a zone holds `capacity` values; the smoothed reading is the mean of
 * whatever is retained.
 */
export class HistoryBuffer {
  private readonly samples: Record<Zone, number[]> = { radiator: [], storage: [] };

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new FanwiseError(`History capacity must be a positive integer, got ${capacity}`);
    }
  }

  push(zone: Zone, value: number): void {
    const window = this.samples[zone];
    window.push(value);
    while (window.length > this.capacity) {
      window.shift();
    }
  }

  /** Push one reading for every zone. */
  pushAll(readings: ZoneReadings): void {
    this.push("radiator", readings.radiator);
    this.push("storage", readings.storage);
  }

  mean(zone: Zone): number {
    const window = this.samples[zone];
    if (window.length === 0) {
      throw new FanwiseError(`No ${zone} samples recorded yet`);
    }
    return window.reduce((sum, v) => sum + v, 0) / window.length;
  }

  means(): ZoneReadings {
    return { radiator: this.mean("radiator"), storage: this.mean("storage") };
  }

  latest(zone: Zone): number | undefined {
    const window = this.samples[zone];
    return window[window.length - 1];
  }

  size(zone: Zone): number {
    return this.samples[zone].length;
  }

  values(zone: Zone): readonly number[] {
    return [...this.samples[zone]];
  }

  clear(): void {
    this.samples.radiator = [];
    this.samples.storage = [];
  }
}
