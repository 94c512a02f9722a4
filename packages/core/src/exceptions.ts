// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/** Typed error hierarchy for Fanwise. */

export class FanwiseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FanwiseError";
  }
}

export class ConfigurationError extends FanwiseError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class SensorUnavailableError extends FanwiseError {
  constructor(
    public readonly zone: "radiator" | "storage",
    public readonly reason: string,
    detail?: string,
  ) {
    super(`Sensor for ${zone} is unavailable (${reason})${detail ? `: ${detail}` : ""}`);
    this.name = "SensorUnavailableError";
  }
}

export class ActuationError extends FanwiseError {
  constructor(
    public readonly group: "radiator" | "storage",
    public readonly percent: number,
    detail: string,
  ) {
    super(`Failed to set ${group} fans to ${percent}%: ${detail}`);
    this.name = "ActuationError";
  }
}

export class PersistenceError extends FanwiseError {
  constructor(
    public readonly path: string,
    cause?: string,
  ) {
    super(`Failed to persist Q-table to '${path}'${cause ? `: ${cause}` : ""}`);
    this.name = "PersistenceError";
  }
}

export class CollaboratorTimeoutError extends FanwiseError {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number,
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = "CollaboratorTimeoutError";
  }
}
