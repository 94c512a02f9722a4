// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { describe, expect, it } from "vitest";
import { RewardModel, rewardSettingsFromConfig } from "../../src/engine/reward.js";
import { defaultConfig } from "../../src/config/config.js";

const model = new RewardModel(rewardSettingsFromConfig(defaultConfig));

describe("RewardModel.zoneScore", () => {
  it("scores an exact hit in the perfect band", () => {
    expect(model.zoneScore("radiator", 35)).toEqual({ error: 0, band: "perfect", value: 30 });
    expect(model.zoneScore("storage", 60)).toEqual({ error: 0, band: "perfect", value: 25 });
  });

  it("treats the hysteresis boundary as perfect", () => {
    expect(model.zoneScore("radiator", 37)).toEqual({ error: 2, band: "perfect", value: 28 });
    expect(model.zoneScore("radiator", 37.5)).toEqual({ error: 2.5, band: "excellent", value: 18.75 });
  });

  it("uses absolute error on both sides of the target", () => {
    expect(model.zoneScore("radiator", 31).value).toBe(model.zoneScore("radiator", 39).value);
  });

  it("applies the good and far bands", () => {
    expect(model.zoneScore("radiator", 43)).toEqual({ error: 8, band: "good", value: 2 });
    expect(model.zoneScore("radiator", 50)).toEqual({ error: 15, band: "far", value: -30 });
    expect(model.zoneScore("storage", 90)).toEqual({ error: 30, band: "far", value: -45 });
  });
});

describe("RewardModel.breakdown", () => {
  it("adds efficiency and cool bonuses when both zones sit at target", () => {
    const b = model.breakdown(35, 60, 30, 30);
    expect(b.radiator.value).toBe(30);
    expect(b.storage.value).toBe(25);
    expect(b.noise).toBeCloseTo(0.9, 10);
    expect(b.efficiency).toBeCloseTo(8.4, 10);
    expect(b.cool).toBe(8);
    expect(b.total).toBeCloseTo(70.5, 10);
  });

  it("withholds the cool bonus above target but keeps efficiency inside the excellent band", () => {
    const b = model.breakdown(39, 70, 100, 100);
    expect(b.radiator).toEqual({ error: 4, band: "excellent", value: 18 });
    expect(b.storage).toEqual({ error: 10, band: "excellent", value: 15 });
    expect(b.noise).toBe(3);
    expect(b.efficiency).toBe(0);
    expect(b.cool).toBe(0);
    expect(b.total).toBe(30);
  });

  it("gives no bonuses once a zone leaves its excellent band", () => {
    const b = model.breakdown(43, 74, 50, 50);
    expect(b.efficiency).toBe(0);
    expect(b.cool).toBe(0);
    expect(b.noise).toBe(1.5);
    expect(b.total).toBeCloseTo(2 - 3.2 - 1.5, 10);
  });

  it("prefers slower fans when temperatures are equal", () => {
    expect(model.score(34, 58, 30, 30)).toBeGreaterThan(model.score(34, 58, 100, 100));
  });
});
