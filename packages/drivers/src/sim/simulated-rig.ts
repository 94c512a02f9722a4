// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/drivers/src/sim/simulated-rig.ts
// SimulatedRig: a two-zone thermal model standing in for real hardware.
//
// Each zone relaxes towards a steady state that depends on the fan duty:
//
//   steady = ambient + heatLoad / (baseConductance + fanConductance · duty/100)
//   T      ← T + (steady − T) · responsiveness   (once per radiator sample)

import type {
    ActuationResult,
    Actuator,
    DeviceTemperature,
    FanGroup,
    Sampler,
    SensorResult,
    TemperatureSample,
    Zone,
} from "@fanwise/core";

export interface ZoneModel {
    heatLoad: number;
    baseConductance: number;
    fanConductance: number;
    /** Fraction of the gap to steady state closed per step, 0..1 */
    responsiveness: number;
}

export interface SimulatedRigOptions {
    ambient: number;
    radiator: ZoneModel;
    storage: ZoneModel;
    /** Peak-to-peak sensor noise in °C */
    noise: number;
    storageDevices: number;
    initialSpeed: number;
}

export const DEFAULT_RIG: SimulatedRigOptions = {
    ambient: 25,
    radiator: { heatLoad: 12, baseConductance: 0.5, fanConductance: 1.0, responsiveness: 0.3 },
    storage: { heatLoad: 30, baseConductance: 0.5, fanConductance: 0.5, responsiveness: 0.2 },
    noise: 0.4,
    storageDevices: 2,
    initialSpeed: 50,
};

export class SimulatedRig implements Sampler, Actuator {
    private readonly opts: SimulatedRigOptions;
    private readonly temps: Record<Zone, number>;
    private readonly speeds: Record<FanGroup, number>;
    private steps = 0;

    constructor(
        opts: Partial<SimulatedRigOptions> = {},
        private readonly random: () => number = Math.random,
        private readonly clock: () => Date = () => new Date(),
    ) {
        this.opts = { ...DEFAULT_RIG, ...opts };
        this.speeds = { radiator: this.opts.initialSpeed, storage: this.opts.initialSpeed };
        this.temps = {
            radiator: this.steadyState("radiator"),
            storage: this.steadyState("storage"),
        };
    }

    /** Equilibrium temperature of a zone at its current fan duty. */
    steadyState(zone: Zone): number {
        const model = this.opts[zone];
        const conductance = model.baseConductance + (model.fanConductance * this.speeds[zone]) / 100;
        return this.opts.ambient + model.heatLoad / conductance;
    }

    temperature(zone: Zone): number {
        return this.temps[zone];
    }

    speed(group: FanGroup): number {
        return this.speeds[group];
    }

    get stepCount(): number {
        return this.steps;
    }

    /** Add heat to a zone, e.g. to provoke the emergency override. */
    setHeatLoad(zone: Zone, heatLoad: number): void {
        this.opts[zone] = { ...this.opts[zone], heatLoad };
    }

    step(): void {
        for (const zone of ["radiator", "storage"] as const) {
            const model = this.opts[zone];
            this.temps[zone] += (this.steadyState(zone) - this.temps[zone]) * model.responsiveness;
        }
        this.steps++;
    }

    async sampleRadiator(): Promise<SensorResult<TemperatureSample>> {
        this.step();
        return { ok: true, value: { celsius: this.noisy(this.temps.radiator), timestamp: this.clock() } };
    }

    async sampleStorage(): Promise<SensorResult<DeviceTemperature[]>> {
        const devices: DeviceTemperature[] = [];
        for (let i = 0; i < this.opts.storageDevices; i++) {
            // Later drives sit slightly cooler in the airflow
            devices.push({ deviceId: `nvme${i}n1`, celsius: this.noisy(this.temps.storage - i) });
        }
        return { ok: true, value: devices };
    }

    async setSpeed(group: FanGroup, percent: number, signal?: AbortSignal): Promise<ActuationResult> {
        if (signal?.aborted) {
            return { ok: false, reason: "timeout", detail: "aborted before update" };
        }
        this.speeds[group] = Math.min(100, Math.max(0, percent));
        return { ok: true };
    }

    private noisy(celsius: number): number {
        return celsius + (this.random() - 0.5) * this.opts.noise;
    }
}
