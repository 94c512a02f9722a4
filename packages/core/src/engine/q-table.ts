// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import type { Action, State } from "../types.js";
import { actionKey, parseActionKey, parseStateKey, stateKey } from "./state.js";

export interface LearningRates {
  /** Learning rate */
  alpha: number;
  /** Discount factor */
  gamma: number;
}

/** Persisted shape: state key → action key → value. */
export type QTableJSON = Record<string, Record<string, number>>;

export interface QEntry {
  state: State;
  action: Action;
  value: number;
}

/**
 * Tabular action-value store. Unseen (state, action) pairs read as 0.0 and
 * rows are created on first update; nothing is ever removed.
 */
export class QTable {
  private readonly rows = new Map<string, Map<string, number>>();

  constructor(private readonly rates: LearningRates) {}

  get(state: State, action: Action): number {
    return this.rows.get(stateKey(state))?.get(actionKey(action)) ?? 0.0;
  }

  set(state: State, action: Action, value: number): void {
    const key = stateKey(state);
    let row = this.rows.get(key);
    if (!row) {
      row = new Map();
      this.rows.set(key, row);
    }
    row.set(actionKey(action), value);
  }

  hasState(state: State): boolean {
    const row = this.rows.get(stateKey(state));
    return row !== undefined && row.size > 0;
  }

  /** Highest stored value for a state; 0.0 when the state has no entries. */
  maxValue(state: State): number {
    const row = this.rows.get(stateKey(state));
    if (!row || row.size === 0) return 0.0;
    let best = -Infinity;
    for (const value of row.values()) {
      if (value > best) best = value;
    }
    return best;
  }

  /** Stored actions of a state with their values, in insertion order. */
  actionsFor(state: State): Array<{ action: Action; value: number }> {
    const row = this.rows.get(stateKey(state));
    if (!row) return [];
    const out: Array<{ action: Action; value: number }> = [];
    for (const [key, value] of row) {
      const action = parseActionKey(key);
      if (action) out.push({ action, value });
    }
    return out;
  }

  /**
   * Temporal-difference update:
   *   Q(s,a) ← Q(s,a) + α · (r + γ · max_a' Q(s',a') − Q(s,a))
   * Returns the new value.
   */
  update(state: State, action: Action, reward: number, nextState: State): number {
    const current = this.get(state, action);
    const future = this.maxValue(nextState);
    const updated = current + this.rates.alpha * (reward + this.rates.gamma * future - current);
    this.set(state, action, updated);
    return updated;
  }

  /** Number of states with at least one entry. */
  get size(): number {
    return this.rows.size;
  }

  get entryCount(): number {
    let count = 0;
    for (const row of this.rows.values()) count += row.size;
    return count;
  }

  *entries(): IterableIterator<QEntry> {
    for (const [sKey, row] of this.rows) {
      const state = parseStateKey(sKey);
      if (!state) continue;
      for (const [aKey, value] of row) {
        const action = parseActionKey(aKey);
        if (action) yield { state, action, value };
      }
    }
  }

  toJSON(): QTableJSON {
    const out: QTableJSON = {};
    for (const [sKey, row] of this.rows) {
      out[sKey] = Object.fromEntries(row);
    }
    return out;
  }

  /**
   * Rebuild from the persisted shape. Entries whose keys do not decode or
   * whose values are not finite numbers are skipped and counted.
   */
  static fromJSON(data: unknown, rates: LearningRates): { table: QTable; skipped: number } {
    const table = new QTable(rates);
    let skipped = 0;
    if (data === null || typeof data !== "object" || Array.isArray(data)) {
      return { table, skipped };
    }

    for (const [sKey, row] of Object.entries(data)) {
      const state = parseStateKey(sKey);
      if (!state || row === null || typeof row !== "object" || Array.isArray(row)) {
        skipped++;
        continue;
      }
      for (const [aKey, value] of Object.entries(row)) {
        const action = parseActionKey(aKey);
        if (!action || typeof value !== "number" || !Number.isFinite(value)) {
          skipped++;
          continue;
        }
        table.set(state, action, value);
      }
    }
    return { table, skipped };
  }
}
