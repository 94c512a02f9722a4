import { describe, it, expect } from "vitest";
import { bucketRange, formatDailyRow, formatStateRow, formatTotals } from "../../src/format.js";

describe("bucketRange", () => {
    it("shows the span a bucket covers", () => {
        expect(bucketRange(11, 3)).toBe("33–36°C");
        expect(bucketRange(-1, 3)).toBe("-3–0°C");
    });
});

describe("formatStateRow", () => {
    it("lists both zones, the best action and its value", () => {
        expect(formatStateRow({ radiator: 11, storage: 20 }, { radiator: 40, storage: 50 }, 12.5, 3)).toBe(
            "  RAD 33–36°C    STORAGE 60–63°C    → R/C=40/50  Q=12.50",
        );
    });
});

describe("formatTotals", () => {
    it("summarises recorded cycles", () => {
        expect(
            formatTotals({
                cycles: 200,
                emergencies: 2,
                explorations: 30,
                actuationFailures: 1,
                lastTimestamp: "2026-03-02T10:00:00.000Z",
                lastEpsilon: 0.1,
            }),
        ).toBe("200 cycles, 2 emergency, 15.0% exploration, 1 actuation failures, epsilon 0.1000");
    });

    it("handles an empty history", () => {
        expect(
            formatTotals({
                cycles: 0,
                emergencies: 0,
                explorations: 0,
                actuationFailures: 0,
                lastTimestamp: null,
                lastEpsilon: null,
            }),
        ).toBe("0 cycles, 0 emergency, 0.0% exploration, 0 actuation failures, epsilon n/a");
    });
});

describe("formatDailyRow", () => {
    it("renders one day without alerts", () => {
        expect(
            formatDailyRow({
                date: "2026-03-01",
                cycles: 8640,
                avgRadiator: 36.2,
                avgStorage: 61.4,
                maxRadiator: 40.1,
                maxStorage: 66,
                avgRadiatorSpeed: 45.4,
                avgStorageSpeed: 52.6,
                avgReward: 21.25,
                emergencies: 0,
                actuationFailures: 0,
            }),
        ).toBe(
            "  2026-03-01   8640 cycles  RAD 36.2°C (max 40.1)  STORAGE 61.4°C (max 66.0)  fans 45%/53%  reward 21.25",
        );
    });
});
