// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/drivers/src/exec/run-command.ts
// Thin execFile wrapper: no shell, bounded runtime, optional stdin.

import { execFile } from "child_process";
import { FanwiseError } from "@fanwise/core";

export interface CommandResult {
    stdout: string;
    stderr: string;
}

export interface CommandOptions {
    /** Child is killed after this many ms (default 10 s) */
    timeoutMs?: number;
    input?: string;
    /** Kills the child when aborted; reported like a timeout */
    signal?: AbortSignal;
}

export type CommandRunner = (file: string, args: string[], opts?: CommandOptions) => Promise<CommandResult>;

export class CommandError extends FanwiseError {
    constructor(
        public readonly command: string,
        public readonly timedOut: boolean,
        detail: string,
    ) {
        super(`${command} ${timedOut ? "timed out" : "failed"}: ${detail}`);
        this.name = "CommandError";
    }
}

export const runCommand: CommandRunner = (file, args, opts = {}) =>
    new Promise<CommandResult>((resolve, reject) => {
        const child = execFile(
            file,
            args,
            { timeout: opts.timeoutMs ?? 10_000, encoding: "utf8", maxBuffer: 1024 * 1024, signal: opts.signal },
            (err, stdout, stderr) => {
                if (err) {
                    const detail = stderr.trim() || err.message;
                    const stopped = err.killed === true || err.name === "AbortError";
                    reject(new CommandError([file, ...args].join(" "), stopped, detail));
                    return;
                }
                resolve({ stdout, stderr });
            },
        );
        if (opts.input !== undefined) {
            child.stdin?.end(opts.input);
        }
    });
