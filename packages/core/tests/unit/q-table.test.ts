// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { describe, expect, it } from "vitest";
import { QTable } from "../../src/engine/q-table.js";

const rates = { alpha: 0.1, gamma: 0.9 };
const s = { radiator: 11, storage: 20 };
const next = { radiator: 12, storage: 20 };
const a = { radiator: 40, storage: 50 };

describe("QTable", () => {
  it("reads unseen pairs as zero", () => {
    const table = new QTable(rates);
    expect(table.get(s, a)).toBe(0);
    expect(table.maxValue(s)).toBe(0);
    expect(table.hasState(s)).toBe(false);
    expect(table.size).toBe(0);
  });

  it("applies the temporal-difference rule from zero", () => {
    const table = new QTable(rates);
    expect(table.update(s, a, 10, next)).toBe(1);
    expect(table.get(s, a)).toBe(1);
    expect(table.hasState(s)).toBe(true);
  });

  it("discounts the best value of the next state", () => {
    const table = new QTable(rates);
    table.set(next, { radiator: 30, storage: 30 }, 5);
    table.set(next, { radiator: 40, storage: 30 }, 2);
    expect(table.update(s, a, 10, next)).toBeCloseTo(1.45, 10);
  });

  it("converges to r / (1 - gamma) for a self-loop", () => {
    const table = new QTable(rates);
    for (let i = 0; i < 2000; i++) table.update(s, a, 1, s);
    expect(table.get(s, a)).toBeCloseTo(10, 5);
  });

  it("takes the maximum even when every value is negative", () => {
    const table = new QTable(rates);
    table.set(s, { radiator: 30, storage: 30 }, -3);
    table.set(s, { radiator: 40, storage: 30 }, -1);
    expect(table.maxValue(s)).toBe(-1);
  });

  it("counts states and entries", () => {
    const table = new QTable(rates);
    table.set(s, a, 1);
    table.set(s, { radiator: 30, storage: 30 }, 2);
    table.set(next, a, 3);
    expect(table.size).toBe(2);
    expect(table.entryCount).toBe(3);
    expect([...table.entries()]).toContainEqual({ state: next, action: a, value: 3 });
  });

  it("serialises to nested string keys", () => {
    const table = new QTable(rates);
    table.set({ radiator: -1, storage: 20 }, a, 1.5);
    expect(table.toJSON()).toEqual({ "-1_20": { "40_50": 1.5 } });
  });

  it("skips malformed entries when rebuilding", () => {
    const { table, skipped } = QTable.fromJSON(
      {
        "11_20": { "40_50": 1.5, bad: 2, "30_50": "x" },
        nope: { "30_30": 1 },
        "3_4": 5,
      },
      rates,
    );
    expect(skipped).toBe(4);
    expect(table.size).toBe(1);
    expect(table.get(s, a)).toBe(1.5);
  });

  it("returns an empty table for non-object input", () => {
    expect(QTable.fromJSON([1, 2], rates).table.size).toBe(0);
    expect(QTable.fromJSON(null, rates).table.size).toBe(0);
  });
});
