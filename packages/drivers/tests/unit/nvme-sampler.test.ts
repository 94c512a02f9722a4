// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { describe, it, expect } from "vitest";
import { NvmeSampler, parseSmartLogTemperature } from "../../src/nvme/nvme-sampler.js";
import { CommandError, type CommandRunner } from "../../src/exec/run-command.js";

const smartLog = (kelvin: number) => JSON.stringify({ critical_warning: 0, temperature: kelvin, avail_spare: 100 });

function runnerFor(byDevice: Record<string, string | Error>): CommandRunner {
    return async (_file, args) => {
        const dev = args[args.length - 1] ?? "";
        const out = byDevice[dev];
        if (out === undefined) throw new Error(`unexpected device ${dev}`);
        if (out instanceof Error) throw out;
        return { stdout: out, stderr: "" };
    };
}

const DEV = ["nvme1n1", "sda", "nvme0n1", "nvme0n1p1", "nvme0"];

describe("parseSmartLogTemperature", () => {
    it("converts Kelvin to Celsius", () => {
        expect(parseSmartLogTemperature(smartLog(318))).toBe(45);
    });

    it("rejects zero, missing and malformed temperatures", () => {
        expect(parseSmartLogTemperature(smartLog(0))).toBeNull();
        expect(parseSmartLogTemperature("{}")).toBeNull();
        expect(parseSmartLogTemperature("garbage")).toBeNull();
    });
});

describe("NvmeSampler", () => {
    it("discovers namespace devices in sorted order", () => {
        const sampler = new NvmeSampler({ devicePattern: "^nvme\\d+n1$" }, runnerFor({}), () => DEV);
        expect(sampler.discover()).toEqual(["nvme0n1", "nvme1n1"]);
    });

    it("reads every discovered drive", async () => {
        const calls: string[][] = [];
        const inner = runnerFor({ "/dev/nvme0n1": smartLog(318), "/dev/nvme1n1": smartLog(323) });
        const run: CommandRunner = (file, args, opts) => {
            calls.push([file, ...args]);
            return inner(file, args, opts);
        };
        const sampler = new NvmeSampler({ devicePattern: "^nvme\\d+n1$" }, run, () => DEV);

        expect(await sampler.sampleStorage()).toEqual({
            ok: true,
            value: [
                { deviceId: "nvme0n1", celsius: 45 },
                { deviceId: "nvme1n1", celsius: 50 },
            ],
        });
        expect(calls[0]).toEqual(["nvme", "smart-log", "-o", "json", "/dev/nvme0n1"]);
    });

    it("keeps the drives that answered", async () => {
        const sampler = new NvmeSampler(
            { devicePattern: "^nvme\\d+n1$" },
            runnerFor({ "/dev/nvme0n1": new Error("permission denied"), "/dev/nvme1n1": smartLog(323) }),
            () => DEV,
        );
        expect(await sampler.sampleStorage()).toEqual({ ok: true, value: [{ deviceId: "nvme1n1", celsius: 50 }] });
    });

    it("reports no_devices when nothing matches", async () => {
        const sampler = new NvmeSampler({ devicePattern: "^nvme\\d+n1$" }, runnerFor({}), () => ["sda"]);
        expect(await sampler.sampleStorage()).toEqual({
            ok: false,
            reason: "no_devices",
            detail: "no devices match /^nvme\\d+n1$/",
        });
    });

    it("reports timeout only when every drive timed out", async () => {
        const timeout = new CommandError("nvme smart-log", true, "killed");
        const allSlow = new NvmeSampler(
            { devicePattern: "^nvme\\d+n1$" },
            runnerFor({ "/dev/nvme0n1": timeout, "/dev/nvme1n1": timeout }),
            () => DEV,
        );
        const mixed = new NvmeSampler(
            { devicePattern: "^nvme\\d+n1$" },
            runnerFor({ "/dev/nvme0n1": timeout, "/dev/nvme1n1": "not json" }),
            () => DEV,
        );

        expect(await allSlow.sampleStorage()).toMatchObject({ ok: false, reason: "timeout" });
        expect(await mixed.sampleStorage()).toMatchObject({ ok: false, reason: "unavailable" });
    });

    it("reports unavailable when /dev cannot be listed", async () => {
        const sampler = new NvmeSampler({ devicePattern: "^nvme\\d+n1$" }, runnerFor({}), () => {
            throw new Error("EACCES");
        });
        expect(await sampler.sampleStorage()).toEqual({
            ok: false,
            reason: "unavailable",
            detail: "cannot list devices: EACCES",
        });
    });
});
