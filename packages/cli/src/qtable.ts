import { Command } from "commander";
import chalk from "chalk";
import { ActionSpace, EpsilonGreedyPolicy, QTableStore, loadConfig, parseStateKey, type State } from "@fanwise/core";

import { formatStateRow } from "./format.js";

export const qtableCommand = new Command("qtable")
    .description("Show the learned best action per state")
    .option("-c, --config <path>", "Config file (YAML)")
    .option("-n, --top <number>", "Maximum number of states to list", "40")
    .action((options: { config?: string; top: string }) => {
        const config = loadConfig(options.config);
        const store = new QTableStore(config.persistence.qTablePath);
        const loaded = store.load({ alpha: config.qLearning.alpha, gamma: config.qLearning.gamma });

        if (loaded.status !== "loaded") {
            console.log(chalk.yellow(`[Fanwise] No usable Q-table at ${store.path} (${loaded.status})`));
            return;
        }

        const table = loaded.table;
        const space = new ActionSpace(config.fans.radiator, config.fans.storage);
        const policy = new EpsilonGreedyPolicy(table, space, { ...config.qLearning, epsilonStart: 0 });

        console.log(
            chalk.bold("Q-table: ") + `${table.size} states, ${table.entryCount} entries (${store.path})`,
        );

        const states = Object.keys(table.toJSON())
            .map(parseStateKey)
            .filter((s): s is State => s !== null)
            .sort((a, b) => a.radiator - b.radiator || a.storage - b.storage);

        const limit = Math.max(1, parseInt(options.top, 10) || 40);
        for (const state of states.slice(0, limit)) {
            const action = policy.bestAction(state);
            console.log(formatStateRow(state, action, table.get(state, action), config.stateBucketing.step));
        }
        if (states.length > limit) {
            console.log(chalk.dim(`  … ${states.length - limit} more`));
        }
    });
