// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * TelemetryLog: append-only CSV with one row per completed cycle.
 * The header is written once, when the file is new or empty.
 */

import { appendFileSync, existsSync, mkdirSync, statSync } from "fs";
import { dirname } from "path";

import type { CycleReport, TelemetrySink } from "../types.js";

export const CSV_HEADER = [
  "timestamp",
  "rad_mean",
  "storage_mean",
  "rad_speed",
  "storage_speed",
  "reward",
  "epsilon",
  "q_states",
  "emergency",
] as const;

export function formatCsvRow(report: CycleReport): string {
  return [
    report.timestamp.toISOString(),
    report.means.radiator.toFixed(2),
    report.means.storage.toFixed(2),
    String(report.action.radiator),
    String(report.action.storage),
    report.reward.toFixed(2),
    report.epsilon.toFixed(4),
    String(report.qStates),
    report.source === "emergency" ? "1" : "0",
  ].join(",");
}

export class TelemetryLog implements TelemetrySink {
  constructor(readonly path: string) {
    const dir = dirname(path);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    if (!existsSync(path) || statSync(path).size === 0) {
      appendFileSync(path, CSV_HEADER.join(",") + "\n", "utf8");
    }
  }

  record(report: CycleReport): void {
    appendFileSync(this.path, formatCsvRow(report) + "\n", "utf8");
  }
}
