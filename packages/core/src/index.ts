// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * Fanwise public API.
 * Import from this module when embedding the control engine.
 */

export { VERSION } from "./version.js";
export type {
  Zone,
  FanGroup,
  State,
  Action,
  ZoneReadings,
  TemperatureSample,
  DeviceTemperature,
  SensorFailureReason,
  ActuationFailureReason,
  SensorResult,
  ActuationResult,
  Sampler,
  Actuator,
  NotificationSink,
  LoopPhase,
  ActionSource,
  CycleReport,
  CycleSkip,
  TelemetrySink,
} from "./types.js";
export {
  FanwiseError,
  ConfigurationError,
  SensorUnavailableError,
  ActuationError,
  PersistenceError,
  CollaboratorTimeoutError,
} from "./exceptions.js";
export { loadConfig, parseConfig, defaultConfig } from "./config/config.js";
export type { FanwiseConfig, FanGroupConfig, QLearningConfig, NextStateMode, ZoneRewardConfig } from "./config/config.js";
export { Logger, colorForTemperature } from "./logging/logger.js";
export type { LogLevel, LoggerOptions } from "./logging/logger.js";
export { HistoryBuffer } from "./engine/history.js";
export {
  StateEncoder,
  bucket,
  stateKey,
  actionKey,
  parseStateKey,
  parseActionKey,
  KEY_SEPARATOR,
} from "./engine/state.js";
export { ActionSpace, speedGrid } from "./engine/actions.js";
export { RewardModel, rewardSettingsFromConfig } from "./engine/reward.js";
export type { RewardBand, RewardBreakdown, RewardSettings, ZoneScore } from "./engine/reward.js";
export { QTable } from "./engine/q-table.js";
export type { LearningRates, QTableJSON, QEntry } from "./engine/q-table.js";
export { EpsilonGreedyPolicy } from "./engine/policy.js";
export type { EpsilonSchedule, PolicyChoice, RandomSource } from "./engine/policy.js";
export { EmergencyOverride } from "./engine/emergency.js";
export type { EmergencyCheck, EmergencyThresholds } from "./engine/emergency.js";
export { QTableStore } from "./persistence/q-table-store.js";
export type { LoadResult, LoadStatus } from "./persistence/q-table-store.js";
export { TelemetryLog, CSV_HEADER, formatCsvRow } from "./telemetry/csv-log.js";
export { CycleStore } from "./telemetry/cycle-store.js";
export type { CycleTotals, DailySummary } from "./telemetry/cycle-store.js";
export { ControlLoop } from "./control/loop.js";
export type { ControlLoopOptions, CycleOutcome } from "./control/loop.js";
export { withTimeout, abortableSleep, errorMessage } from "./control/timeout.js";
