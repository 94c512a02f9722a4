// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import type { Action, Zone, ZoneReadings } from "../types.js";

export interface EmergencyThresholds {
  radiatorCritical: number;
  storageCritical: number;
}

export type EmergencyCheck =
  | { active: false; cleared: boolean }
  | {
      active: true;
      action: Action;
      /** True only on the cycle that crossed into the critical condition */
      entered: boolean;
      zones: Zone[];
    };

/**
 * Forces full cooling while any instantaneous reading is above its critical
 * threshold. `entered` is true once per episode, `cleared` once when it ends.
 */
export class EmergencyOverride {
  private active = false;

  constructor(
    private readonly thresholds: EmergencyThresholds,
    private readonly maxAction: Action,
  ) {}

  get isActive(): boolean {
    return this.active;
  }

  check(instant: ZoneReadings): EmergencyCheck {
    const zones: Zone[] = [];
    if (instant.radiator > this.thresholds.radiatorCritical) zones.push("radiator");
    if (instant.storage > this.thresholds.storageCritical) zones.push("storage");

    if (zones.length === 0) {
      const cleared = this.active;
      this.active = false;
      return { active: false, cleared };
    }

    const entered = !this.active;
    this.active = true;
    return { active: true, action: { ...this.maxAction }, entered, zones };
  }
}
