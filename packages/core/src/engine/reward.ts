// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * RewardModel scores how well the last action held both zones near target,
 * traded against fan noise.
 *
 * Per zone the absolute error from target falls into one of four bands:
 *
 *   error ≤ hysteresis       perfect    perfectBase   − perfectSlope   · error
 *   error ≤ excellentBand    excellent  excellentBase − excellentSlope · error
 *   error ≤ goodBand         good       goodBase      − goodSlope      · error
 *   otherwise                far        − farSlope · error^farExponent
 *
 * The noise term always pulls towards lower speeds. The efficiency bonus
 * (and the cool bonus) only apply once both zones are inside their excellent
 * bands, so slow fans are rewarded only when temperatures allow it.
 */

import type { FanwiseConfig, ZoneRewardConfig } from "../config/config.js";
import type { Zone } from "../types.js";

export type RewardBand = "perfect" | "excellent" | "good" | "far";

export interface ZoneScore {
  error: number;
  band: RewardBand;
  value: number;
}

export interface RewardBreakdown {
  radiator: ZoneScore;
  storage: ZoneScore;
  noise: number;
  efficiency: number;
  cool: number;
  total: number;
}

export interface RewardSettings {
  targets: Record<Zone, number>;
  hysteresis: Record<Zone, number>;
  bands: Record<Zone, ZoneRewardConfig>;
  noisePenalty: number;
  efficiencyBonus: number;
  coolBonus: number;
  /** Sum of both groups' maximum speeds; normalises the speed terms. */
  maxTotalSpeed: number;
}

export function rewardSettingsFromConfig(config: FanwiseConfig): RewardSettings {
  return {
    targets: { ...config.targets },
    hysteresis: { ...config.hysteresis },
    bands: { radiator: config.reward.radiator, storage: config.reward.storage },
    noisePenalty: config.qLearning.noisePenalty,
    efficiencyBonus: config.reward.efficiencyBonus,
    coolBonus: config.reward.coolBonus,
    maxTotalSpeed: config.fans.radiator.max + config.fans.storage.max,
  };
}

export class RewardModel {
  constructor(private readonly settings: RewardSettings) {}

  score(radiatorMean: number, storageMean: number, radiatorSpeed: number, storageSpeed: number): number {
    return this.breakdown(radiatorMean, storageMean, radiatorSpeed, storageSpeed).total;
  }

  breakdown(radiatorMean: number, storageMean: number, radiatorSpeed: number, storageSpeed: number): RewardBreakdown {
    const { targets, bands, maxTotalSpeed } = this.settings;
    const radiator = this.zoneScore("radiator", radiatorMean);
    const storage = this.zoneScore("storage", storageMean);

    const totalSpeed = radiatorSpeed + storageSpeed;
    const noise = maxTotalSpeed > 0 ? (this.settings.noisePenalty * totalSpeed) / maxTotalSpeed : 0;

    let efficiency = 0;
    let cool = 0;
    const bothExcellent =
      radiator.error <= bands.radiator.excellentBand && storage.error <= bands.storage.excellentBand;
    if (bothExcellent) {
      if (maxTotalSpeed > 0) {
        efficiency = (this.settings.efficiencyBonus * (maxTotalSpeed - totalSpeed)) / maxTotalSpeed;
      }
      if (radiatorMean <= targets.radiator && storageMean <= targets.storage) {
        cool = this.settings.coolBonus;
      }
    }

    return {
      radiator,
      storage,
      noise,
      efficiency,
      cool,
      total: radiator.value + storage.value - noise + efficiency + cool,
    };
  }

  zoneScore(zone: Zone, celsius: number): ZoneScore {
    const cfg = this.settings.bands[zone];
    const error = Math.abs(celsius - this.settings.targets[zone]);

    if (error <= this.settings.hysteresis[zone]) {
      return { error, band: "perfect", value: cfg.perfectBase - cfg.perfectSlope * error };
    }
    if (error <= cfg.excellentBand) {
      return { error, band: "excellent", value: cfg.excellentBase - cfg.excellentSlope * error };
    }
    if (error <= cfg.goodBand) {
      return { error, band: "good", value: cfg.goodBase - cfg.goodSlope * error };
    }
    return { error, band: "far", value: -cfg.farSlope * Math.pow(error, cfg.farExponent) };
  }
}
