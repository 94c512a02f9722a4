// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { describe, expect, it } from "vitest";
import { ActionSpace } from "../../src/engine/actions.js";
import { EpsilonGreedyPolicy } from "../../src/engine/policy.js";
import { QTable } from "../../src/engine/q-table.js";

const group = { min: 30, max: 100, step: 10 };
const state = { radiator: 11, storage: 20 };

function setup(epsilonStart: number, random: () => number, decay = 0.995) {
  const table = new QTable({ alpha: 0.1, gamma: 0.9 });
  const space = new ActionSpace(group, group);
  const policy = new EpsilonGreedyPolicy(
    table,
    space,
    { epsilonStart, epsilonMin: 0.05, epsilonDecay: decay },
    random,
  );
  return { table, space, policy };
}

describe("EpsilonGreedyPolicy", () => {
  it("explores an unseen state even with epsilon 0", () => {
    const { policy } = setup(0, () => 0);
    expect(policy.choose(state)).toEqual({ action: { radiator: 30, storage: 30 }, explored: true });
  });

  it("exploits the highest-valued action of a known state", () => {
    const { table, policy } = setup(0.15, () => 0.99);
    table.set(state, { radiator: 30, storage: 30 }, 1);
    table.set(state, { radiator: 70, storage: 60 }, 4);
    expect(policy.choose(state)).toEqual({ action: { radiator: 70, storage: 60 }, explored: false });
  });

  it("explores a known state when the draw falls under epsilon", () => {
    const { table, policy } = setup(0.15, () => 0.1);
    table.set(state, { radiator: 70, storage: 60 }, 4);
    const choice = policy.choose(state);
    expect(choice.explored).toBe(true);
    // floor(0.1 * 64) = 6 → radiator 30, storage 90
    expect(choice.action).toEqual({ radiator: 30, storage: 90 });
  });

  it("breaks ties by enumeration order, not insertion order", () => {
    const { table, policy } = setup(0, () => 0.5);
    table.set(state, { radiator: 40, storage: 30 }, 5);
    table.set(state, { radiator: 30, storage: 40 }, 5);
    expect(policy.bestAction(state)).toEqual({ radiator: 30, storage: 40 });
  });

  it("ranks off-grid actions after grid actions on a tie", () => {
    const { table, policy } = setup(0, () => 0.5);
    table.set(state, { radiator: 35, storage: 35 }, 5);
    table.set(state, { radiator: 100, storage: 100 }, 5);
    expect(policy.bestAction(state)).toEqual({ radiator: 100, storage: 100 });
  });

  it("decays epsilon down to the floor", () => {
    const { policy } = setup(0.15, () => 0.5, 0.5);
    expect(policy.epsilon).toBe(0.15);
    expect(policy.decay()).toBe(0.075);
    expect(policy.decay()).toBe(0.05);
    expect(policy.decay()).toBe(0.05);
  });

  it("keeps epsilon within [min, start] over many cycles", () => {
    const { policy } = setup(0.15, () => 0.5);
    for (let i = 0; i < 5000; i++) {
      const eps = policy.decay();
      expect(eps).toBeGreaterThanOrEqual(0.05);
      expect(eps).toBeLessThanOrEqual(0.15);
    }
    expect(policy.epsilon).toBe(0.05);
  });

  it("clamps a random source that returns 1", () => {
    const { policy } = setup(1, () => 1);
    expect(policy.choose(state).action).toEqual({ radiator: 100, storage: 100 });
  });
});
