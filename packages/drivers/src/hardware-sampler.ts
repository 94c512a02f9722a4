// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import type { DeviceTemperature, Sampler, SensorResult, TemperatureSample } from "@fanwise/core";
import type { LiquidctlController } from "./liquidctl/liquidctl.js";
import type { NvmeSampler } from "./nvme/nvme-sampler.js";

/** Radiator from the liquid-cooling controller, storage from the NVMe drives. */
export class HardwareSampler implements Sampler {
    constructor(
        private readonly coolant: Pick<LiquidctlController, "readCoolant">,
        private readonly drives: Pick<NvmeSampler, "sampleStorage">,
    ) { }

    sampleRadiator(): Promise<SensorResult<TemperatureSample>> {
        return this.coolant.readCoolant();
    }

    sampleStorage(): Promise<SensorResult<DeviceTemperature[]>> {
        return this.drives.sampleStorage();
    }
}
