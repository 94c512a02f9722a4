// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// ControlLoop owns every piece of learning state and runs one control cycle
// at a time.
//
// Phase graph:
//   idle → sampling → deciding → actuating → learning → persisting → sleeping → sampling …
//   sampling ──(sensor failure)──→ sleeping (retry interval)
//   any ──(stop / unexpected error)──→ shutting_down → stopped
//
// Usage:
//   const loop = new ControlLoop({ config, sampler, actuator, notifier, store })
//   process.on("SIGTERM", () => void loop.stop())
//   await loop.start()

import EventEmitter from "events";

import type { FanwiseConfig, NextStateMode } from "../config/config.js";
import { ActionSpace } from "../engine/actions.js";
import { EmergencyOverride, type EmergencyCheck } from "../engine/emergency.js";
import { HistoryBuffer } from "../engine/history.js";
import { EpsilonGreedyPolicy, type RandomSource } from "../engine/policy.js";
import type { QTable } from "../engine/q-table.js";
import { RewardModel, rewardSettingsFromConfig } from "../engine/reward.js";
import { StateEncoder, stateKey } from "../engine/state.js";
import { ActuationError, CollaboratorTimeoutError, FanwiseError, SensorUnavailableError } from "../exceptions.js";
import { Logger, colorForTemperature } from "../logging/logger.js";
import type { QTableStore } from "../persistence/q-table-store.js";
import type {
  Action,
  ActionSource,
  ActuationResult,
  Actuator,
  CycleReport,
  CycleSkip,
  FanGroup,
  LoopPhase,
  NotificationSink,
  Sampler,
  SensorFailureReason,
  SensorResult,
  State,
  TelemetrySink,
  Zone,
  ZoneReadings,
} from "../types.js";
import { abortableSleep, errorMessage, withTimeout } from "./timeout.js";

export interface ControlLoopOptions {
  config: FanwiseConfig;
  sampler: Sampler;
  actuator: Actuator;
  notifier: NotificationSink;
  store: QTableStore;
  /** Discard the persisted table instead of restoring it. */
  resetTable?: boolean;
  logger?: Logger;
  telemetry?: TelemetrySink[];
  random?: RandomSource;
  clock?: () => Date;
  sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
}

export type CycleOutcome = { kind: "completed"; report: CycleReport } | { kind: "skipped"; skip: CycleSkip };

interface PendingTransition {
  state: State;
  action: Action;
  reward: number;
}

type ZoneSample = { ok: true; value: ZoneReadings } | { ok: false; zone: Zone; reason: SensorFailureReason; detail: string };

export class ControlLoop extends EventEmitter {
  readonly history: HistoryBuffer;
  readonly actions: ActionSpace;
  readonly rewards: RewardModel;
  readonly table: QTable;
  readonly policy: EpsilonGreedyPolicy;

  private readonly encoder: StateEncoder;
  private readonly override: EmergencyOverride;
  private readonly log: Logger;
  private readonly telemetry: TelemetrySink[];
  private readonly clock: () => Date;
  private readonly sleep: (ms: number, signal: AbortSignal) => Promise<void>;
  private readonly nextStateMode: NextStateMode;

  private phase: LoopPhase = "idle";
  private cycleCount = 0;
  private cyclesSinceSave = 0;
  private pending: PendingTransition | null = null;
  private abandonedWrite: Promise<void> | null = null;
  private stopRequested = false;
  private abort = new AbortController();
  private finished: Promise<void> | null = null;

  constructor(private readonly opts: ControlLoopOptions) {
    super();
    const { config } = opts;
    this.log = opts.logger ?? new Logger({ level: config.logging.level });
    this.telemetry = opts.telemetry ?? [];
    this.clock = opts.clock ?? (() => new Date());
    this.sleep = opts.sleep ?? abortableSleep;
    this.nextStateMode = config.qLearning.nextState;

    this.history = new HistoryBuffer(config.stateBucketing.historyLength);
    this.encoder = new StateEncoder(config.stateBucketing.step);
    this.actions = new ActionSpace(config.fans.radiator, config.fans.storage);
    this.rewards = new RewardModel(rewardSettingsFromConfig(config));
    this.override = new EmergencyOverride(config.emergency, {
      radiator: config.fans.radiator.max,
      storage: config.fans.storage.max,
    });

    const loaded = opts.store.load(
      { alpha: config.qLearning.alpha, gamma: config.qLearning.gamma },
      { reset: opts.resetTable ?? config.persistence.resetOnStart },
    );
    switch (loaded.status) {
      case "loaded":
        this.log.info(`Q-table loaded with ${loaded.table.size} states from ${opts.store.path}`);
        break;
      case "reset":
        this.log.info("Resetting Q-table as requested");
        break;
      case "missing":
      case "empty":
        this.log.info("Initializing new Q-table");
        break;
      case "corrupt":
        this.log.warn(`Q-table at ${opts.store.path} is unreadable (${loaded.detail ?? "unknown"}); starting empty`);
        break;
    }
    if (loaded.skipped > 0) {
      this.log.warn(`Skipped ${loaded.skipped} malformed Q-table entries`);
    }
    this.table = loaded.table;

    this.policy = new EpsilonGreedyPolicy(this.table, this.actions, config.qLearning, opts.random);
  }

  get currentPhase(): LoopPhase {
    return this.phase;
  }

  get cycles(): number {
    return this.cycleCount;
  }

  get emergencyActive(): boolean {
    return this.override.isActive;
  }

  // ── Lifecycle ──────────────────────────────────────────────────────────────

  /** Run cycles until stop(); resolves after the final save. */
  start(): Promise<void> {
    if (this.finished) {
      throw new FanwiseError("Control loop is already running");
    }
    this.stopRequested = false;
    this.abort = new AbortController();
    this.finished = this.run().finally(() => {
      this.finished = null;
    });
    return this.finished;
  }

  /** Request shutdown and wait for the loop to finish. */
  async stop(): Promise<void> {
    this.stopRequested = true;
    this.abort.abort();
    const running = this.finished;
    if (running) {
      // Failures surface through start()
      await running.catch(() => undefined);
    }
  }

  private async run(): Promise<void> {
    const { targets, mainLoop } = this.opts.config;
    this.log.info(
      `Starting fan control: targets RAD=${targets.radiator}°C, STORAGE=${targets.storage}°C, ` +
        `epsilon=${this.policy.epsilon.toFixed(3)}, ${this.actions.size} actions`,
    );
    await this.notify(
      "Fanwise started",
      `Adaptive fan control is active. Targets: radiator ${targets.radiator}°C, storage ${targets.storage}°C.`,
    );

    let failed = false;
    let failure: unknown;
    try {
      while (!this.stopRequested) {
        const outcome = await this.runCycle();
        if (this.stopRequested) break;
        const seconds = outcome.kind === "completed" ? mainLoop.intervalSeconds : mainLoop.retrySeconds;
        this.setPhase("sleeping");
        await this.sleep(seconds * 1000, this.abort.signal);
      }
    } catch (err) {
      failed = true;
      failure = err;
    }

    await this.shutdown(failed ? failure : undefined, failed);
    if (failed) {
      throw failure;
    }
  }

  private async shutdown(failure: unknown, failed: boolean): Promise<void> {
    this.setPhase("shutting_down");

    if (failed) {
      this.log.error(`Unhandled error in control loop: ${errorMessage(failure)}`);
      // Leave the hardware at a known safe speed.
      await this.actuate({ radiator: this.opts.config.fans.radiator.max, storage: this.opts.config.fans.storage.max });
    }

    this.persist();

    if (failed) {
      await this.notify("Fanwise crashed", `The fan controller stopped because of an error: ${errorMessage(failure)}`);
    } else {
      this.log.info(`Fan control stopped after ${this.cycleCount} cycles`);
      await this.notify("Fanwise stopped", `The fan controller was stopped after ${this.cycleCount} cycles.`);
    }
    this.setPhase("stopped");
  }

  // ── One cycle ──────────────────────────────────────────────────────────────

  async runCycle(): Promise<CycleOutcome> {
    const cycle = ++this.cycleCount;
    const timestamp = this.clock();

    this.setPhase("sampling");
    const sample = await this.sample();
    if (!sample.ok) {
      const skip: CycleSkip = { cycle, timestamp, zone: sample.zone, reason: sample.reason, detail: sample.detail };
      this.log.warn(new SensorUnavailableError(sample.zone, sample.reason, sample.detail).message + "; skipping cycle");
      this.emit("skip", skip);
      return { kind: "skipped", skip };
    }

    const instant = sample.value;
    this.history.pushAll(instant);
    const means = this.history.means();
    const state = this.encoder.encode(means.radiator, means.storage);

    this.setPhase("deciding");
    const { action, source } = await this.decide(state, instant);

    this.setPhase("actuating");
    const actuationOk = await this.actuate(action);

    this.setPhase("learning");
    const reward = this.rewards.score(means.radiator, means.storage, action.radiator, action.storage);
    this.learn(state, action, reward);
    const epsilon = this.policy.decay();

    const report: CycleReport = {
      cycle,
      timestamp,
      instant,
      means,
      state,
      action,
      source,
      reward,
      epsilon,
      qStates: this.table.size,
      actuationOk,
    };
    this.publish(report);

    this.setPhase("persisting");
    this.cyclesSinceSave++;
    if (this.cyclesSinceSave >= this.opts.config.mainLoop.saveIntervalCycles) {
      this.cyclesSinceSave = 0;
      this.persist();
    }

    this.emit("cycle", report);
    return { kind: "completed", report };
  }

  private async sample(): Promise<ZoneSample> {
    const sensorMs = this.opts.config.timeouts.sensorSeconds * 1000;

    const radiator = await this.guardSensor("radiator", () => this.opts.sampler.sampleRadiator(), sensorMs);
    if (!radiator.ok) return { ...radiator, zone: "radiator" };
    if (!Number.isFinite(radiator.value.celsius)) {
      return { ok: false, zone: "radiator", reason: "parse_error", detail: `reading ${radiator.value.celsius}` };
    }

    const storage = await this.guardSensor("storage", () => this.opts.sampler.sampleStorage(), sensorMs);
    if (!storage.ok) return { ...storage, zone: "storage" };
    const temps = storage.value.map((d) => d.celsius).filter((c) => Number.isFinite(c));
    if (temps.length === 0) {
      return { ok: false, zone: "storage", reason: "no_devices", detail: "no storage temperatures reported" };
    }
    if (this.log.isEnabled("DEBUG")) {
      this.log.debug(`Storage devices: ${storage.value.map((d) => `${d.deviceId}=${d.celsius}°C`).join(", ")}`);
    }

    return { ok: true, value: { radiator: radiator.value.celsius, storage: Math.max(...temps) } };
  }

  private async guardSensor<T>(
    zone: Zone,
    read: () => Promise<SensorResult<T>>,
    timeoutMs: number,
  ): Promise<SensorResult<T>> {
    try {
      return await withTimeout(read(), timeoutMs, `${zone} sample`);
    } catch (err) {
      if (err instanceof CollaboratorTimeoutError) {
        return { ok: false, reason: "timeout", detail: err.message };
      }
      return { ok: false, reason: "unavailable", detail: errorMessage(err) };
    }
  }

  private async decide(state: State, instant: ZoneReadings): Promise<{ action: Action; source: ActionSource }> {
    const check = this.override.check(instant);
    if (check.active) {
      await this.onEmergency(check, instant);
      return { action: check.action, source: "emergency" };
    }
    if (check.cleared) {
      this.log.info(
        `Emergency cleared: RAD=${instant.radiator.toFixed(1)}°C, STORAGE=${instant.storage.toFixed(1)}°C`,
      );
    }

    const choice = this.policy.choose(state);
    this.log.debug(
      `${choice.explored ? "Exploring" : "Exploiting"}: action R/C=${choice.action.radiator}/${choice.action.storage} for state ${stateKey(state)}`,
    );
    return { action: choice.action, source: choice.explored ? "exploration" : "exploitation" };
  }

  private async onEmergency(check: Extract<EmergencyCheck, { active: true }>, instant: ZoneReadings): Promise<void> {
    const temps = `RAD: ${instant.radiator.toFixed(1)}°C, STORAGE: ${instant.storage.toFixed(1)}°C`;
    if (!check.entered) {
      this.log.debug(`Emergency cooling still active (${temps})`);
      return;
    }
    this.log.warn(`Emergency override activated for ${check.zones.join(" and ")} at ${temps}`);
    this.emit("emergency", { zones: check.zones, instant });
    await this.notify("Critical temperature", `Emergency cooling activated! ${temps}`);
  }

  /** Apply both groups; failures are logged and reported, never thrown. */
  private async actuate(action: Action): Promise<boolean> {
    const actuatorMs = this.opts.config.timeouts.actuatorSeconds * 1000;
    let ok = true;
    for (const group of ["radiator", "storage"] as const) {
      const result = await this.guardActuator(group, action[group], actuatorMs);
      if (!result.ok) {
        ok = false;
        this.log.error(`${new ActuationError(group, action[group], result.detail).message} (${result.reason})`);
      }
    }
    return ok;
  }

  /**
   * One fan write at a time: a write abandoned on timeout is aborted, and the
   * next write waits for it to settle so it can never land afterwards.
   */
  private async guardActuator(group: FanGroup, percent: number, timeoutMs: number): Promise<ActuationResult> {
    if (this.abandonedWrite) {
      this.log.debug(`Waiting for an abandoned fan update before setting ${group} to ${percent}%`);
      await this.abandonedWrite;
      this.abandonedWrite = null;
    }

    const controller = new AbortController();
    let call: Promise<ActuationResult> | undefined;
    try {
      call = this.opts.actuator.setSpeed(group, percent, controller.signal);
      return await withTimeout(call, timeoutMs, `${group} fan update`);
    } catch (err) {
      if (err instanceof CollaboratorTimeoutError) {
        controller.abort();
        if (call) {
          this.abandonedWrite = call.then(
            () => undefined,
            () => undefined,
          );
        }
        return { ok: false, reason: "timeout", detail: err.message };
      }
      return { ok: false, reason: "device_error", detail: errorMessage(err) };
    }
  }

  private learn(state: State, action: Action, reward: number): void {
    if (this.nextStateMode === "same_cycle") {
      this.table.update(state, action, reward, state);
      return;
    }
    // The previous transition's successor is the state observed now.
    if (this.pending) {
      this.table.update(this.pending.state, this.pending.action, this.pending.reward, state);
    }
    this.pending = { state, action, reward };
  }

  private publish(report: CycleReport): void {
    const { means, action, state } = report;
    this.log.info(
      `State: ${stateKey(state)}, Temps: RAD=${means.radiator.toFixed(1)}°C, STORAGE=${means.storage.toFixed(1)}°C | ` +
        `Action: R/C=${action.radiator}/${action.storage} (${report.source}) | Reward: ${report.reward.toFixed(2)} | ` +
        `Epsilon: ${report.epsilon.toFixed(3)} | Q-States: ${report.qStates}`,
      colorForTemperature(means.radiator),
    );

    for (const sink of this.telemetry) {
      try {
        sink.record(report);
      } catch (err) {
        this.log.warn(`Telemetry sink failed: ${errorMessage(err)}`);
      }
    }
  }

  /** Save the table; a failure keeps the in-memory table and is retried at the next save. */
  persist(): boolean {
    try {
      this.opts.store.save(this.table);
      this.log.debug(`Q-table with ${this.table.size} states saved to ${this.opts.store.path}`);
      this.emit("saved", this.opts.store.path);
      return true;
    } catch (err) {
      this.log.error(errorMessage(err));
      return false;
    }
  }

  private async notify(subject: string, message: string): Promise<void> {
    try {
      await withTimeout(
        this.opts.notifier.notify(subject, message),
        this.opts.config.timeouts.notifySeconds * 1000,
        `notification '${subject}'`,
      );
    } catch (err) {
      this.log.warn(`Notification '${subject}' failed: ${errorMessage(err)}`);
    }
  }

  private setPhase(phase: LoopPhase): void {
    if (this.phase === phase) return;
    this.phase = phase;
    this.emit("phase", phase);
  }
}
