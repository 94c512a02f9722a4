import { Command } from "commander";
import {
    ControlLoop,
    CycleStore,
    Logger,
    QTableStore,
    TelemetryLog,
    loadConfig,
    type Actuator,
    type FanwiseConfig,
    type NotificationSink,
    type Sampler,
    type TelemetrySink,
} from "@fanwise/core";
import {
    HardwareSampler,
    LiquidctlController,
    LogNotifier,
    MailNotifier,
    NvmeSampler,
    SimulatedRig,
} from "@fanwise/drivers";

interface RunOptions {
    config?: string;
    debug: boolean;
    resetQtable: boolean;
    simulate: boolean;
}

function buildHardware(config: FanwiseConfig, simulate: boolean): { sampler: Sampler; actuator: Actuator } {
    if (simulate) {
        const rig = new SimulatedRig();
        return { sampler: rig, actuator: rig };
    }
    const liquidctl = new LiquidctlController({
        ...config.liquidctl,
        readTimeoutMs: config.timeouts.sensorSeconds * 1000,
        groupTimeoutMs: config.timeouts.actuatorSeconds * 1000,
    });
    const nvme = new NvmeSampler({
        devicePattern: config.nvme.devicePattern,
        timeoutMs: config.timeouts.sensorSeconds * 1000,
    });
    return { sampler: new HardwareSampler(liquidctl, nvme), actuator: liquidctl };
}

export async function runController(options: RunOptions): Promise<void> {
    const config = loadConfig(options.config);
    const logger = new Logger({
        level: options.debug ? "DEBUG" : config.logging.level,
        file: config.logging.file,
    });

    const notifier: NotificationSink = config.notify.enabled
        ? new MailNotifier(config.notify.recipient, logger.child("Notify"), undefined, config.timeouts.notifySeconds * 1000)
        : new LogNotifier(logger.child("Notify"));
    const { sampler, actuator } = buildHardware(config, options.simulate);
    if (options.simulate) {
        logger.warn("Running against a simulated rig; no hardware will be touched");
    }

    const telemetry: TelemetrySink[] = [];
    if (config.telemetry.csvPath) {
        telemetry.push(new TelemetryLog(config.telemetry.csvPath));
    }
    const cycleStore = config.telemetry.dbPath ? new CycleStore(config.telemetry.dbPath) : null;
    if (cycleStore) {
        telemetry.push(cycleStore);
    }

    const loop = new ControlLoop({
        config,
        sampler,
        actuator,
        notifier,
        store: new QTableStore(config.persistence.qTablePath),
        resetTable: options.resetQtable ? true : undefined,
        logger,
        telemetry,
    });

    const onSignal = (signal: NodeJS.Signals) => {
        logger.info(`Received ${signal}, shutting down`);
        void loop.stop();
    };
    process.once("SIGINT", onSignal);
    process.once("SIGTERM", onSignal);

    try {
        await loop.start();
    } finally {
        process.off("SIGINT", onSignal);
        process.off("SIGTERM", onSignal);
        cycleStore?.close();
    }
}

export const runCommand = new Command("run")
    .description("Run the adaptive fan controller until interrupted")
    .option("-c, --config <path>", "Config file (YAML)")
    .option("--debug", "Enable debug logging", false)
    .option("--reset-qtable", "Discard the persisted Q-table on start", false)
    .option("--simulate", "Drive a simulated thermal rig instead of hardware", false)
    .action(async (options: RunOptions) => {
        await runController(options);
    });
