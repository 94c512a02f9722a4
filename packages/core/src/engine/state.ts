// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { FanwiseError } from "../exceptions.js";
import type { Action, State } from "../types.js";

/** Floor-division discretisation. Negative temperatures give negative buckets. */
export function bucket(celsius: number, step: number): number {
  return Math.floor(celsius / step);
}

export class StateEncoder {
  constructor(readonly step: number) {
    if (!(step > 0)) {
      throw new FanwiseError(`Bucket step must be positive, got ${step}`);
    }
  }

  encode(radiatorMean: number, storageMean: number): State {
    return {
      radiator: bucket(radiatorMean, this.step),
      storage: bucket(storageMean, this.step),
    };
  }
}

// ── Key encoding ─────────────────────────────────────────────────────────────
//
// States and actions are integer pairs. Both are keyed as "<a>_<b>" with
// decimal components, e.g. state (11, 20) → "11_20", action (30, 100) → "30_100".
// "_" never appears in a decimal integer, so the encoding is reversible even
// for negative buckets ("-1_3").

export const KEY_SEPARATOR = "_";

const PAIR_KEY = /^(-?\d+)_(-?\d+)$/;

function pairKey(a: number, b: number): string {
  return `${a}${KEY_SEPARATOR}${b}`;
}

function parsePair(key: string): [number, number] | null {
  const match = PAIR_KEY.exec(key);
  if (!match) return null;
  return [Number(match[1]), Number(match[2])];
}

export function stateKey(state: State): string {
  return pairKey(state.radiator, state.storage);
}

export function actionKey(action: Action): string {
  return pairKey(action.radiator, action.storage);
}

export function parseStateKey(key: string): State | null {
  const pair = parsePair(key);
  return pair ? { radiator: pair[0], storage: pair[1] } : null;
}

export function parseActionKey(key: string): Action | null {
  const pair = parsePair(key);
  return pair ? { radiator: pair[0], storage: pair[1] } : null;
}
