// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * Configuration loader for Fanwise.
 * Reads fanwise.yaml from the working directory or /etc/fanwise/config.yaml.
 * Validates with Zod and provides typed defaults.
 */

import { existsSync, readFileSync } from "fs";
import { homedir } from "os";
import { join } from "path";

import yaml from "js-yaml";
import { z } from "zod";

import { ConfigurationError } from "../exceptions.js";

// ── Zod schema ───────────────────────────────────────────────────────────────

const ZoneNumbers = (radiator: number, storage: number) =>
  z
    .object({
      radiator: z.number().default(radiator),
      storage: z.number().default(storage),
    })
    .default({});

const FanGroupSchema = (min: number, max: number, step: number) =>
  z
    .object({
      min: z.number().int().min(0).max(100).default(min),
      max: z.number().int().min(0).max(100).default(max),
      step: z.number().int().positive().default(step),
    })
    .default({});

const ZoneRewardSchema = (defaults: ZoneRewardConfig) =>
  z
    .object({
      perfectBase: z.number().default(defaults.perfectBase),
      perfectSlope: z.number().nonnegative().default(defaults.perfectSlope),
      excellentBand: z.number().nonnegative().default(defaults.excellentBand),
      excellentBase: z.number().default(defaults.excellentBase),
      excellentSlope: z.number().nonnegative().default(defaults.excellentSlope),
      goodBand: z.number().nonnegative().default(defaults.goodBand),
      goodBase: z.number().default(defaults.goodBase),
      goodSlope: z.number().nonnegative().default(defaults.goodSlope),
      farSlope: z.number().nonnegative().default(defaults.farSlope),
      farExponent: z.number().positive().default(defaults.farExponent),
    })
    .default({});

export interface ZoneRewardConfig {
  perfectBase: number;
  perfectSlope: number;
  /** Upper error bound of the "excellent" band, in °C. */
  excellentBand: number;
  excellentBase: number;
  excellentSlope: number;
  /** Upper error bound of the "good" band, in °C. */
  goodBand: number;
  goodBase: number;
  goodSlope: number;
  farSlope: number;
  farExponent: number;
}

const RewardSchema = z
  .object({
    radiator: ZoneRewardSchema({
      perfectBase: 30,
      perfectSlope: 1,
      excellentBand: 6,
      excellentBase: 20,
      excellentSlope: 0.5,
      goodBand: 10,
      goodBase: 10,
      goodSlope: 1,
      farSlope: 2,
      farExponent: 1,
    }),
    storage: ZoneRewardSchema({
      perfectBase: 25,
      perfectSlope: 1,
      excellentBand: 10,
      excellentBase: 18,
      excellentSlope: 0.3,
      goodBand: 15,
      goodBase: 8,
      goodSlope: 0.8,
      farSlope: 1.5,
      farExponent: 1,
    }),
    efficiencyBonus: z.number().nonnegative().default(12),
    coolBonus: z.number().nonnegative().default(8),
  })
  .default({});

const QLearningSchema = z
  .object({
    alpha: z.number().gt(0).max(1).default(0.1),
    gamma: z.number().min(0).lt(1).default(0.9),
    epsilonStart: z.number().min(0).max(1).default(0.15),
    epsilonMin: z.number().min(0).max(1).default(0.05),
    epsilonDecay: z.number().gt(0).max(1).default(0.995),
    noisePenalty: z.number().nonnegative().default(3),
    nextState: z.enum(["next_cycle", "same_cycle"]).default("next_cycle"),
  })
  .default({});

const StateBucketingSchema = z
  .object({
    step: z.number().positive().default(3),
    historyLength: z.number().int().positive().default(5),
  })
  .default({});

const EmergencySchema = z
  .object({
    radiatorCritical: z.number().default(65),
    storageCritical: z.number().default(80),
  })
  .default({});

const MainLoopSchema = z
  .object({
    intervalSeconds: z.number().nonnegative().default(10),
    saveIntervalCycles: z.number().int().positive().default(30),
    /** Shorter wait used after a failed sensor read */
    retrySeconds: z.number().nonnegative().default(5),
  })
  .default({});

const TimeoutsSchema = z
  .object({
    sensorSeconds: z.number().positive().default(15),
    actuatorSeconds: z.number().positive().default(15),
    notifySeconds: z.number().positive().default(10),
  })
  .default({});

const DATA_DIR = join(homedir(), ".fanwise");

const PersistenceSchema = z
  .object({
    qTablePath: z.string().min(1).default(join(DATA_DIR, "q_table.json")),
    resetOnStart: z.boolean().default(false),
  })
  .default({});

const TelemetrySchema = z
  .object({
    /** null disables the CSV log */
    csvPath: z.string().min(1).nullable().default(join(DATA_DIR, "fan_monitor_data.csv")),
    /** null disables the SQLite cycle store */
    dbPath: z.string().min(1).nullable().default(join(DATA_DIR, "cycles.db")),
  })
  .default({});

const LoggingSchema = z
  .object({
    level: z.enum(["DEBUG", "INFO", "WARNING", "ERROR"]).default("INFO"),
    file: z.string().min(1).optional(),
  })
  .default({});

const LiquidctlSchema = z
  .object({
    /** Passed to `liquidctl --match` */
    deviceMatch: z.string().min(1).default("Commander Core XT"),
    /** Substring of the status key holding the coolant temperature */
    tempSensorKey: z.string().min(1).default("Temperature 1"),
    radiatorFanIds: z.array(z.number().int().positive()).min(1).default([1, 2, 3]),
    storageFanIds: z.array(z.number().int().positive()).min(1).default([4, 5, 6]),
  })
  .default({});

const NvmeSchema = z
  .object({
    /** Matched against entries of /dev */
    devicePattern: z.string().min(1).default("^nvme\\d+n1$"),
  })
  .default({});

const NotifySchema = z
  .object({
    enabled: z.boolean().default(true),
    recipient: z.string().min(1).default("root"),
  })
  .default({});

const ConfigSchema = z
  .object({
    targets: ZoneNumbers(35, 60),
    hysteresis: ZoneNumbers(2, 3),
    reward: RewardSchema,
    fans: z
      .object({
        radiator: FanGroupSchema(30, 100, 10),
        storage: FanGroupSchema(30, 100, 10),
      })
      .default({}),
    qLearning: QLearningSchema,
    stateBucketing: StateBucketingSchema,
    emergency: EmergencySchema,
    mainLoop: MainLoopSchema,
    timeouts: TimeoutsSchema,
    persistence: PersistenceSchema,
    telemetry: TelemetrySchema,
    logging: LoggingSchema,
    liquidctl: LiquidctlSchema,
    nvme: NvmeSchema,
    notify: NotifySchema,
  })
  .superRefine((cfg, ctx) => {
    for (const group of ["radiator", "storage"] as const) {
      const fans = cfg.fans[group];
      if (fans.min > fans.max) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["fans", group, "min"],
          message: `must not exceed fans.${group}.max (${fans.max})`,
        });
      }

      const bands = cfg.reward[group];
      if (cfg.hysteresis[group] > bands.excellentBand) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["hysteresis", group],
          message: `must not exceed reward.${group}.excellent_band (${bands.excellentBand})`,
        });
      }
      if (bands.excellentBand > bands.goodBand) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["reward", group, "excellentBand"],
          message: `must not exceed reward.${group}.good_band (${bands.goodBand})`,
        });
      }
    }

    if (cfg.qLearning.epsilonMin > cfg.qLearning.epsilonStart) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["qLearning", "epsilonMin"],
        message: `must not exceed q_learning.epsilon_start (${cfg.qLearning.epsilonStart})`,
      });
    }
  });

export type FanwiseConfig = z.infer<typeof ConfigSchema>;
export type FanGroupConfig = FanwiseConfig["fans"]["radiator"];
export type QLearningConfig = FanwiseConfig["qLearning"];
export type NextStateMode = QLearningConfig["nextState"];

// ── YAML key → camelCase mapping ─────────────────────────────────────────────

/** Convert snake_case YAML keys to camelCase for Zod schema. */
function toCamel(obj: unknown): unknown {
  if (Array.isArray(obj)) return obj.map(toCamel);
  if (obj !== null && typeof obj === "object") {
    return Object.fromEntries(
      Object.entries(obj).map(([k, v]) => [
        k.replace(/_([a-z])/g, (_, c: string) => c.toUpperCase()),
        toCamel(v),
      ]),
    );
  }
  return obj;
}

/** Camel-cased issue path back to the snake_case key the user wrote. */
function toSnakePath(path: Array<string | number>): string {
  return path.map((p) => String(p).replace(/[A-Z]/g, (c) => `_${c.toLowerCase()}`)).join(".");
}

// ── Loader ───────────────────────────────────────────────────────────────────

const SEARCH_PATHS = ["fanwise.yaml", "config/fanwise.yaml", "/etc/fanwise/config.yaml"];

/** Validate an already-parsed (snake_case or camelCase) config object. */
export function parseConfig(raw: unknown, source = "<inline>"): FanwiseConfig {
  const result = ConfigSchema.safeParse(toCamel(raw ?? {}));
  if (!result.success) {
    const issues = result.error.issues.map((i) => `  ${toSnakePath(i.path)}: ${i.message}`).join("\n");
    throw new ConfigurationError(`Invalid configuration in '${source}':\n${issues}`);
  }
  return result.data;
}

export function loadConfig(configPath?: string): FanwiseConfig {
  if (configPath && !existsSync(configPath)) {
    throw new ConfigurationError(`Config file '${configPath}' does not exist`);
  }

  const paths = configPath ? [configPath] : SEARCH_PATHS;
  const found = paths.find((p) => existsSync(p));

  if (!found) {
    // No config file, every option has a default
    return parseConfig({});
  }

  let raw: unknown;
  try {
    raw = yaml.load(readFileSync(found, "utf8"));
  } catch (err) {
    throw new ConfigurationError(`Failed to read config at '${found}': ${String(err)}`);
  }

  return parseConfig(raw, found);
}

export const defaultConfig: FanwiseConfig = parseConfig({});
