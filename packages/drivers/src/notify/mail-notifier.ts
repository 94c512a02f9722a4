// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { errorMessage, type Logger, type NotificationSink } from "@fanwise/core";
import { runCommand, type CommandRunner } from "../exec/run-command.js";

/** Sends operator mail through the local `mail` command. Never throws. */
export class MailNotifier implements NotificationSink {
    constructor(
        private readonly recipient: string,
        private readonly log: Logger,
        private readonly run: CommandRunner = runCommand,
        private readonly timeoutMs = 10_000,
    ) { }

    async notify(subject: string, message: string): Promise<void> {
        try {
            await this.run("mail", ["-s", subject, this.recipient], { input: message, timeoutMs: this.timeoutMs });
            this.log.info(`Sent notification to ${this.recipient}: '${subject}'`);
        } catch (e) {
            this.log.error(`Failed to send notification '${subject}': ${errorMessage(e)}`);
        }
    }
}

/** Used when mail is disabled: the notification only reaches the log. */
export class LogNotifier implements NotificationSink {
    constructor(private readonly log: Logger) { }

    async notify(subject: string, message: string): Promise<void> {
        this.log.warn(`${subject}: ${message}`);
    }
}
