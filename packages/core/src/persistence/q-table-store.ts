// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * QTableStore: JSON persistence for the learned table.
 *
 * Writes go to "<path>.tmp", are flushed to disk, and only then renamed over
 * the previous file; a crash or power loss mid-write leaves the last good
 * table in place. Loading never fails the process: a missing, empty or
 * unreadable file yields an empty table.
 */

import {
  closeSync,
  existsSync,
  fsyncSync,
  mkdirSync,
  openSync,
  readFileSync,
  renameSync,
  rmSync,
  writeFileSync,
} from "fs";
import { dirname } from "path";

import { PersistenceError } from "../exceptions.js";
import { QTable, type LearningRates } from "../engine/q-table.js";

export type LoadStatus = "loaded" | "missing" | "empty" | "corrupt" | "reset";

export interface LoadResult {
  table: QTable;
  status: LoadStatus;
  /** Entries dropped because their keys or values did not decode. */
  skipped: number;
  detail?: string;
}

export class QTableStore {
  constructor(readonly path: string) {}

  load(rates: LearningRates, opts: { reset?: boolean } = {}): LoadResult {
    if (opts.reset) {
      return { table: new QTable(rates), status: "reset", skipped: 0 };
    }
    if (!existsSync(this.path)) {
      return { table: new QTable(rates), status: "missing", skipped: 0 };
    }

    let text: string;
    try {
      text = readFileSync(this.path, "utf8");
    } catch (err) {
      return { table: new QTable(rates), status: "corrupt", skipped: 0, detail: String(err) };
    }
    if (text.trim() === "") {
      return { table: new QTable(rates), status: "empty", skipped: 0 };
    }

    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (err) {
      return { table: new QTable(rates), status: "corrupt", skipped: 0, detail: String(err) };
    }
    if (data === null || typeof data !== "object" || Array.isArray(data)) {
      return { table: new QTable(rates), status: "corrupt", skipped: 0, detail: "top level is not an object" };
    }

    const { table, skipped } = QTable.fromJSON(data, rates);
    return { table, status: "loaded", skipped };
  }

  /** Atomically replace the persisted table. Throws PersistenceError. */
  save(table: QTable): void {
    const tmp = `${this.path}.tmp`;
    try {
      const dir = dirname(this.path);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
      const fd = openSync(tmp, "w");
      try {
        writeFileSync(fd, JSON.stringify(table.toJSON(), null, 2), "utf8");
        fsyncSync(fd);
      } finally {
        closeSync(fd);
      }
      renameSync(tmp, this.path);
    } catch (err) {
      rmSync(tmp, { force: true });
      throw new PersistenceError(this.path, err instanceof Error ? err.message : String(err));
    }
  }
}
