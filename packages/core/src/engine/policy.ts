// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { FanwiseError } from "../exceptions.js";
import type { Action, State } from "../types.js";
import type { ActionSpace } from "./actions.js";
import type { QTable } from "./q-table.js";

export interface EpsilonSchedule {
  epsilonStart: number;
  epsilonMin: number;
  epsilonDecay: number;
}

export interface PolicyChoice {
  action: Action;
  explored: boolean;
}

/** Uniform draw in [0, 1). */
export type RandomSource = () => number;

/**
 * Epsilon-greedy selection over a QTable.
 *
 * Exploits the best stored action for a known state and explores uniformly
 * otherwise. Among equal values the action that comes first in ActionSpace
 * enumeration order wins; stored actions outside the space (a forced
 * emergency action off the speed grid) rank after every grid action.
 */
export class EpsilonGreedyPolicy {
  private current: number;

  constructor(
    private readonly table: QTable,
    private readonly space: ActionSpace,
    private readonly schedule: EpsilonSchedule,
    private readonly random: RandomSource = Math.random,
  ) {
    if (space.size === 0) {
      throw new FanwiseError("Action space is empty");
    }
    this.current = schedule.epsilonStart;
  }

  get epsilon(): number {
    return this.current;
  }

  choose(state: State): PolicyChoice {
    if (!this.table.hasState(state) || this.random() < this.current) {
      return { action: this.randomAction(), explored: true };
    }
    return { action: this.bestAction(state), explored: false };
  }

  /** Greedy action for a state that has entries. */
  bestAction(state: State): Action {
    let best: { action: Action; value: number; rank: number } | null = null;
    for (const { action, value } of this.table.actionsFor(state)) {
      const rank = this.space.indexOf(action) ?? Number.MAX_SAFE_INTEGER;
      if (best === null || value > best.value || (value === best.value && rank < best.rank)) {
        best = { action, value, rank };
      }
    }
    return best ? best.action : this.randomAction();
  }

  /** Called once per control cycle, after the action has been chosen. */
  decay(): number {
    this.current = Math.max(this.schedule.epsilonMin, this.current * this.schedule.epsilonDecay);
    return this.current;
  }

  private randomAction(): Action {
    const index = Math.min(Math.floor(this.random() * this.space.size), this.space.size - 1);
    return this.space.at(index);
  }
}
