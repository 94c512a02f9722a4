// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { FanwiseError } from "../exceptions.js";
import type { FanGroupConfig } from "../config/config.js";
import type { Action } from "../types.js";
import { actionKey } from "./state.js";

/** Speeds min, min+step, … not exceeding max. */
export function speedGrid(group: FanGroupConfig): number[] {
  if (group.step <= 0) {
    throw new FanwiseError(`Fan step must be positive, got ${group.step}`);
  }
  if (group.min > group.max) {
    throw new FanwiseError(`Fan min ${group.min} exceeds max ${group.max}`);
  }
  const speeds: number[] = [];
  for (let speed = group.min; speed <= group.max; speed += group.step) {
    speeds.push(speed);
  }
  return speeds;
}

/**
 * Every (radiator, storage) speed pair the policy may pick.
 * Enumeration order is radiator ascending, then storage ascending; the policy
 * relies on it for tie-breaking.
 */
export class ActionSpace {
  readonly actions: readonly Action[];
  private readonly order: ReadonlyMap<string, number>;

  constructor(radiator: FanGroupConfig, storage: FanGroupConfig) {
    const actions: Action[] = [];
    for (const r of speedGrid(radiator)) {
      for (const s of speedGrid(storage)) {
        actions.push(Object.freeze({ radiator: r, storage: s }));
      }
    }
    this.actions = Object.freeze(actions);
    this.order = new Map(actions.map((a, i) => [actionKey(a), i]));
  }

  get size(): number {
    return this.actions.length;
  }

  at(index: number): Action {
    const action = this.actions[index];
    if (!action) {
      throw new FanwiseError(`Action index ${index} out of range 0..${this.actions.length - 1}`);
    }
    return action;
  }

  /** Position in enumeration order, or undefined for off-grid actions. */
  indexOf(action: Action): number | undefined {
    return this.order.get(actionKey(action));
  }

  has(action: Action): boolean {
    return this.order.has(actionKey(action));
  }
}
