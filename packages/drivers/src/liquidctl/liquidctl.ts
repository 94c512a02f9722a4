// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/drivers/src/liquidctl/liquidctl.ts
// Radiator sensor + fan actuator over the liquidctl CLI.
//
//   liquidctl --match "<device>" status --json
//   liquidctl --match "<device>" set fan<N> speed <percent>

import { z } from "zod";
import { errorMessage } from "@fanwise/core";
import type { ActuationResult, Actuator, FanGroup, SensorResult, TemperatureSample } from "@fanwise/core";
import { CommandError, runCommand, type CommandRunner } from "../exec/run-command.js";

const statusSchema = z.array(
    z.object({
        description: z.string(),
        status: z.array(
            z.object({
                key: z.string(),
                value: z.union([z.number(), z.string(), z.null()]),
                unit: z.string().optional(),
            }),
        ),
    }),
);

export type LiquidctlStatus = z.infer<typeof statusSchema>;

export interface LiquidctlOptions {
    deviceMatch: string;
    /** Substring of the status key that holds the coolant temperature */
    tempSensorKey: string;
    radiatorFanIds: number[];
    storageFanIds: number[];
    /** Budget for one `status` read */
    readTimeoutMs?: number;
    /** Budget for setting every fan of a group; split evenly across its fans */
    groupTimeoutMs?: number;
}

const DEFAULT_TIMEOUT_MS = 10_000;

/** Parse `status --json` output and pick the coolant temperature. */
export function parseCoolantTemperature(stdout: string, sensorKey: string): number | null {
    let raw: unknown;
    try {
        raw = JSON.parse(stdout);
    } catch {
        return null;
    }
    const parsed = statusSchema.safeParse(raw);
    if (!parsed.success) return null;

    for (const device of parsed.data) {
        for (const entry of device.status) {
            if (!entry.key.includes(sensorKey)) continue;
            const value = typeof entry.value === "number" ? entry.value : parseFloat(String(entry.value));
            if (Number.isFinite(value)) return value;
        }
    }
    return null;
}

export class LiquidctlController implements Actuator {
    constructor(
        private readonly opts: LiquidctlOptions,
        private readonly run: CommandRunner = runCommand,
        private readonly clock: () => Date = () => new Date(),
    ) { }

    async readCoolant(): Promise<SensorResult<TemperatureSample>> {
        let stdout: string;
        try {
            ({ stdout } = await this.run(
                "liquidctl",
                ["--match", this.opts.deviceMatch, "status", "--json"],
                { timeoutMs: this.opts.readTimeoutMs ?? DEFAULT_TIMEOUT_MS },
            ));
        } catch (e) {
            const timedOut = e instanceof CommandError && e.timedOut;
            return { ok: false, reason: timedOut ? "timeout" : "unavailable", detail: errorMessage(e) };
        }

        const celsius = parseCoolantTemperature(stdout, this.opts.tempSensorKey);
        if (celsius === null) {
            return {
                ok: false,
                reason: "parse_error",
                detail: `no '${this.opts.tempSensorKey}' reading from '${this.opts.deviceMatch}'`,
            };
        }
        return { ok: true, value: { celsius, timestamp: this.clock() } };
    }

    async setSpeed(group: FanGroup, percent: number, signal?: AbortSignal): Promise<ActuationResult> {
        const fanIds = group === "radiator" ? this.opts.radiatorFanIds : this.opts.storageFanIds;
        const duty = Math.round(Math.min(100, Math.max(0, percent)));
        const perFanMs = Math.max(1, Math.floor((this.opts.groupTimeoutMs ?? DEFAULT_TIMEOUT_MS) / fanIds.length));

        for (const id of fanIds) {
            if (signal?.aborted) {
                return { ok: false, reason: "timeout", detail: `fan${id}: aborted before update` };
            }
            try {
                await this.run(
                    "liquidctl",
                    ["--match", this.opts.deviceMatch, "set", `fan${id}`, "speed", String(duty)],
                    { timeoutMs: perFanMs, signal },
                );
            } catch (e) {
                const timedOut = e instanceof CommandError && e.timedOut;
                return { ok: false, reason: timedOut ? "timeout" : "device_error", detail: `fan${id}: ${errorMessage(e)}` };
            }
        }
        return { ok: true };
    }
}
