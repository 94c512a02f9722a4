// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * CycleStore: per-cycle history in SQLite (better-sqlite3) for `fanwise report`.
 * Pass ":memory:" for an in-process database.
 */

import Database from "better-sqlite3";
import { existsSync, mkdirSync } from "fs";
import { dirname } from "path";

import { stateKey } from "../engine/state.js";
import type { CycleReport, TelemetrySink } from "../types.js";

export interface DailySummary {
  date: string;
  cycles: number;
  avgRadiator: number;
  avgStorage: number;
  maxRadiator: number;
  maxStorage: number;
  avgRadiatorSpeed: number;
  avgStorageSpeed: number;
  avgReward: number;
  emergencies: number;
  actuationFailures: number;
}

export interface CycleTotals {
  cycles: number;
  emergencies: number;
  explorations: number;
  actuationFailures: number;
  lastTimestamp: string | null;
  lastEpsilon: number | null;
}

const CREATE_CYCLES_TABLE = `
  CREATE TABLE IF NOT EXISTS cycles (
    id               INTEGER PRIMARY KEY AUTOINCREMENT,
    ts               TEXT    NOT NULL,
    cycle            INTEGER NOT NULL,
    rad_instant      REAL    NOT NULL,
    storage_instant  REAL    NOT NULL,
    rad_mean         REAL    NOT NULL,
    storage_mean     REAL    NOT NULL,
    state_key        TEXT    NOT NULL,
    rad_speed        INTEGER NOT NULL,
    storage_speed    INTEGER NOT NULL,
    source           TEXT    NOT NULL,
    reward           REAL    NOT NULL,
    epsilon          REAL    NOT NULL,
    q_states         INTEGER NOT NULL,
    actuation_ok     INTEGER NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_cycles_ts ON cycles(ts);
`;

export class CycleStore implements TelemetrySink {
  private db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath !== ":memory:") {
      const dir = dirname(dbPath);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
    }
    this.db = new Database(dbPath);
    this.db.exec(CREATE_CYCLES_TABLE);
  }

  record(report: CycleReport): void {
    this.db
      .prepare(
        `INSERT INTO cycles
           (ts, cycle, rad_instant, storage_instant, rad_mean, storage_mean, state_key,
            rad_speed, storage_speed, source, reward, epsilon, q_states, actuation_ok)
         VALUES
           (@ts, @cycle, @radInstant, @storageInstant, @radMean, @storageMean, @stateKey,
            @radSpeed, @storageSpeed, @source, @reward, @epsilon, @qStates, @actuationOk)`,
      )
      .run({
        ts: report.timestamp.toISOString(),
        cycle: report.cycle,
        radInstant: report.instant.radiator,
        storageInstant: report.instant.storage,
        radMean: report.means.radiator,
        storageMean: report.means.storage,
        stateKey: stateKey(report.state),
        radSpeed: report.action.radiator,
        storageSpeed: report.action.storage,
        source: report.source,
        reward: report.reward,
        epsilon: report.epsilon,
        qStates: report.qStates,
        actuationOk: report.actuationOk ? 1 : 0,
      });
  }

  /** One row per day, newest first, for the last N days relative to `now`. */
  dailySummary(days: number = 7, now: Date = new Date()): DailySummary[] {
    const since = new Date(now.getTime() - days * 24 * 60 * 60 * 1000).toISOString();
    const rows = this.db
      .prepare(
        `SELECT
           substr(ts, 1, 10)                                 AS date,
           COUNT(*)                                          AS cycles,
           AVG(rad_mean)                                     AS avg_rad,
           AVG(storage_mean)                                 AS avg_storage,
           MAX(rad_instant)                                  AS max_rad,
           MAX(storage_instant)                              AS max_storage,
           AVG(rad_speed)                                    AS avg_rad_speed,
           AVG(storage_speed)                                AS avg_storage_speed,
           AVG(reward)                                       AS avg_reward,
           SUM(CASE WHEN source = 'emergency' THEN 1 ELSE 0 END) AS emergencies,
           SUM(CASE WHEN actuation_ok = 0 THEN 1 ELSE 0 END)     AS failures
         FROM cycles
         WHERE ts >= ?
         GROUP BY substr(ts, 1, 10)
         ORDER BY date DESC`,
      )
      .all(since) as Array<{
      date: string;
      cycles: number;
      avg_rad: number;
      avg_storage: number;
      max_rad: number;
      max_storage: number;
      avg_rad_speed: number;
      avg_storage_speed: number;
      avg_reward: number;
      emergencies: number;
      failures: number;
    }>;

    return rows.map((r) => ({
      date: r.date,
      cycles: r.cycles,
      avgRadiator: r.avg_rad,
      avgStorage: r.avg_storage,
      maxRadiator: r.max_rad,
      maxStorage: r.max_storage,
      avgRadiatorSpeed: r.avg_rad_speed,
      avgStorageSpeed: r.avg_storage_speed,
      avgReward: r.avg_reward,
      emergencies: r.emergencies,
      actuationFailures: r.failures,
    }));
  }

  totals(): CycleTotals {
    const row = this.db
      .prepare(
        `SELECT
           COUNT(*)                                                  AS cycles,
           COALESCE(SUM(CASE WHEN source = 'emergency' THEN 1 ELSE 0 END), 0)   AS emergencies,
           COALESCE(SUM(CASE WHEN source = 'exploration' THEN 1 ELSE 0 END), 0) AS explorations,
           COALESCE(SUM(CASE WHEN actuation_ok = 0 THEN 1 ELSE 0 END), 0)       AS failures
         FROM cycles`,
      )
      .get() as { cycles: number; emergencies: number; explorations: number; failures: number };

    const last = this.db.prepare(`SELECT ts, epsilon FROM cycles ORDER BY id DESC LIMIT 1`).get() as
      | { ts: string; epsilon: number }
      | undefined;

    return {
      cycles: row.cycles,
      emergencies: row.emergencies,
      explorations: row.explorations,
      actuationFailures: row.failures,
      lastTimestamp: last?.ts ?? null,
      lastEpsilon: last?.epsilon ?? null,
    };
  }

  close(): void {
    this.db.close();
  }
}
