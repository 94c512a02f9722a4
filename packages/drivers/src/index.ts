// © 2026 LearnHubPlay BV. All rights reserved.
// packages/drivers/src/index.ts: public API for @fanwise/drivers

export { runCommand, CommandError } from "./exec/run-command.js";
export { LiquidctlController, parseCoolantTemperature } from "./liquidctl/liquidctl.js";
export { NvmeSampler, parseSmartLogTemperature } from "./nvme/nvme-sampler.js";
export { HardwareSampler } from "./hardware-sampler.js";
export { MailNotifier, LogNotifier } from "./notify/mail-notifier.js";
export { SimulatedRig, DEFAULT_RIG } from "./sim/simulated-rig.js";
export type { CommandRunner, CommandResult, CommandOptions } from "./exec/run-command.js";
export type { LiquidctlOptions, LiquidctlStatus } from "./liquidctl/liquidctl.js";
export type { NvmeOptions } from "./nvme/nvme-sampler.js";
export type { SimulatedRigOptions, ZoneModel } from "./sim/simulated-rig.js";
