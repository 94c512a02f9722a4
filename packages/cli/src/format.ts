import chalk from "chalk";
import type { Action, CycleTotals, DailySummary, State } from "@fanwise/core";

/** Temperature span a bucket covers, e.g. bucket 11 with step 3 → "33–36°C". */
export function bucketRange(bucketIndex: number, step: number): string {
    const low = bucketIndex * step;
    return `${low}–${low + step}°C`;
}

export function formatStateRow(state: State, action: Action, value: number, step: number): string {
    return (
        `  RAD ${bucketRange(state.radiator, step).padEnd(10)} ` +
        `STORAGE ${bucketRange(state.storage, step).padEnd(10)} ` +
        `→ R/C=${action.radiator}/${action.storage}  Q=${value.toFixed(2)}`
    );
}

export function formatDailyRow(day: DailySummary): string {
    const alerts = day.emergencies > 0 ? chalk.red(` ⚠ ${day.emergencies} emergency cycles`) : "";
    return (
        `  ${day.date}  ${String(day.cycles).padStart(5)} cycles  ` +
        `RAD ${day.avgRadiator.toFixed(1)}°C (max ${day.maxRadiator.toFixed(1)})  ` +
        `STORAGE ${day.avgStorage.toFixed(1)}°C (max ${day.maxStorage.toFixed(1)})  ` +
        `fans ${day.avgRadiatorSpeed.toFixed(0)}%/${day.avgStorageSpeed.toFixed(0)}%  ` +
        `reward ${day.avgReward.toFixed(2)}${alerts}`
    );
}

export function formatTotals(totals: CycleTotals): string {
    const explorationPct = totals.cycles > 0 ? (totals.explorations / totals.cycles) * 100 : 0;
    const epsilon = totals.lastEpsilon === null ? "n/a" : totals.lastEpsilon.toFixed(4);
    return (
        `${totals.cycles} cycles, ${totals.emergencies} emergency, ` +
        `${explorationPct.toFixed(1)}% exploration, ${totals.actuationFailures} actuation failures, ` +
        `epsilon ${epsilon}`
    );
}
