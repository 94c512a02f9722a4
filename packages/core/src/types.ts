// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * Core shared types for Fanwise.
 * The control engine, the drivers and the CLI operate on these types.
 */

export type Zone = "radiator" | "storage";
export type FanGroup = Zone;

/** Discrete control state: one temperature bucket per zone. */
export interface State {
  radiator: number;
  storage: number;
}

/** Fan duty in percent per group. */
export interface Action {
  radiator: number;
  storage: number;
}

export type ZoneReadings = Record<Zone, number>;

export interface TemperatureSample {
  celsius: number;
  timestamp: Date;
}

export interface DeviceTemperature {
  deviceId: string;
  celsius: number;
}

// ── Collaborator results ─────────────────────────────────────────────────────

export type SensorFailureReason = "unavailable" | "timeout" | "parse_error" | "no_devices";
export type ActuationFailureReason = "device_error" | "timeout";

export type SensorResult<T> =
  | { ok: true; value: T }
  | { ok: false; reason: SensorFailureReason; detail: string };

export type ActuationResult = { ok: true } | { ok: false; reason: ActuationFailureReason; detail: string };

// ── Collaborators ────────────────────────────────────────────────────────────

export interface Sampler {
  sampleRadiator(): Promise<SensorResult<TemperatureSample>>;
  sampleStorage(): Promise<SensorResult<DeviceTemperature[]>>;
}

export interface Actuator {
  /** `signal` aborts once the caller has given up on the call. */
  setSpeed(group: FanGroup, percent: number, signal?: AbortSignal): Promise<ActuationResult>;
}

/** Best-effort operator notification. Implementations should not throw. */
export interface NotificationSink {
  notify(subject: string, message: string): Promise<void>;
}

// ── Cycle output ─────────────────────────────────────────────────────────────

export type LoopPhase =
  | "idle"
  | "sampling"
  | "deciding"
  | "actuating"
  | "learning"
  | "persisting"
  | "sleeping"
  | "shutting_down"
  | "stopped";

export type ActionSource = "exploration" | "exploitation" | "emergency";

/** Everything observed and decided in one completed control cycle. */
export interface CycleReport {
  cycle: number;
  timestamp: Date;
  instant: ZoneReadings;
  means: ZoneReadings;
  state: State;
  action: Action;
  source: ActionSource;
  reward: number;
  epsilon: number;
  qStates: number;
  actuationOk: boolean;
}

export interface CycleSkip {
  cycle: number;
  timestamp: Date;
  zone: Zone;
  reason: SensorFailureReason;
  detail: string;
}

/** Receives one row per completed cycle (CSV log, SQLite store, …). */
export interface TelemetrySink {
  record(report: CycleReport): void;
}
