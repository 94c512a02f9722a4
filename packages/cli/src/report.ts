import { Command } from "commander";
import chalk from "chalk";
import { CycleStore, loadConfig } from "@fanwise/core";

import { formatDailyRow, formatTotals } from "./format.js";

export const reportCommand = new Command("report")
    .description("Summarise recorded control cycles per day")
    .option("-c, --config <path>", "Config file (YAML)")
    .option("-d, --days <number>", "Number of days to include", "7")
    .action((options: { config?: string; days: string }) => {
        const config = loadConfig(options.config);
        if (!config.telemetry.dbPath) {
            console.log(chalk.yellow("[Fanwise] telemetry.db_path is disabled; nothing to report"));
            return;
        }

        const store = new CycleStore(config.telemetry.dbPath);
        try {
            const days = Math.max(1, parseInt(options.days, 10) || 7);
            console.log(chalk.bold("Totals: ") + formatTotals(store.totals()));
            const rows = store.dailySummary(days);
            if (rows.length === 0) {
                console.log(chalk.dim(`  No cycles recorded in the last ${days} days`));
            }
            for (const day of rows) {
                console.log(formatDailyRow(day));
            }
        } finally {
            store.close();
        }
    });
