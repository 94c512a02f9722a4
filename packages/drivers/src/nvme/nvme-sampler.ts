// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/drivers/src/nvme/nvme-sampler.ts
// Storage temperatures via `nvme smart-log -o json /dev/<dev>`.
// nvme-cli reports the composite temperature in Kelvin.

import { readdirSync } from "fs";
import { z } from "zod";
import { errorMessage } from "@fanwise/core";
import type { DeviceTemperature, SensorResult } from "@fanwise/core";
import { CommandError, runCommand, type CommandRunner } from "../exec/run-command.js";

const KELVIN_OFFSET = 273;

const smartLogSchema = z.object({
    temperature: z.number(),
});

export interface NvmeOptions {
    /** Regular expression matched against entries of /dev */
    devicePattern: string;
    timeoutMs?: number;
}

export function parseSmartLogTemperature(stdout: string): number | null {
    let raw: unknown;
    try {
        raw = JSON.parse(stdout);
    } catch {
        return null;
    }
    const parsed = smartLogSchema.safeParse(raw);
    if (!parsed.success || parsed.data.temperature <= 0) return null;
    return parsed.data.temperature - KELVIN_OFFSET;
}

export class NvmeSampler {
    private readonly pattern: RegExp;

    constructor(
        private readonly opts: NvmeOptions,
        private readonly run: CommandRunner = runCommand,
        private readonly listDevices: () => string[] = () => readdirSync("/dev"),
    ) {
        this.pattern = new RegExp(opts.devicePattern);
    }

    discover(): string[] {
        return this.listDevices()
            .filter((name) => this.pattern.test(name))
            .sort();
    }

    async sampleStorage(): Promise<SensorResult<DeviceTemperature[]>> {
        let devices: string[];
        try {
            devices = this.discover();
        } catch (e) {
            return { ok: false, reason: "unavailable", detail: `cannot list devices: ${errorMessage(e)}` };
        }
        if (devices.length === 0) {
            return { ok: false, reason: "no_devices", detail: `no devices match /${this.opts.devicePattern}/` };
        }

        const readings: DeviceTemperature[] = [];
        const failures: string[] = [];
        let timeouts = 0;

        for (const dev of devices) {
            try {
                const { stdout } = await this.run("nvme", ["smart-log", "-o", "json", `/dev/${dev}`], {
                    timeoutMs: this.opts.timeoutMs,
                });
                const celsius = parseSmartLogTemperature(stdout);
                if (celsius === null) {
                    failures.push(`${dev}: unparseable smart-log`);
                } else {
                    readings.push({ deviceId: dev, celsius });
                }
            } catch (e) {
                if (e instanceof CommandError && e.timedOut) timeouts++;
                failures.push(`${dev}: ${errorMessage(e)}`);
            }
        }

        if (readings.length === 0) {
            const reason = timeouts === devices.length ? "timeout" : "unavailable";
            return { ok: false, reason, detail: failures.join("; ") };
        }
        return { ok: true, value: readings };
    }
}
