/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import chalk from 'chalk';
import fs from 'fs-extra';
import os from 'node:os';
import path from 'node:path';
import { redactSensitiveText, redactValue } from './redaction.js';

export interface RoleLogEntry {
    timestamp: string;
    role: string;
    text: string;
}

export interface EventLogEntry {
    timestamp: string;
    type: 'event';
    event: string;
    data: unknown;
}

export type InteractionLogEntry = RoleLogEntry | EventLogEntry;

export interface InteractionLoggerOptions {
    /** Disable writes entirely (e.g. in tests) */
    enabled?: boolean;
    /** Receives write-failure warnings; defaults to a yellow console.warn */
    onWarning?: (message: string) => void;
}

/**
 * Append-only JSON-lines log of prompts, replies and session events.
 * Every string is redacted before it is written. Appends are chained so
 * concurrent callers never interleave partial lines; a failed write is
 * reported and the session carries on.
 */
export class InteractionLogger {
    private readonly logPath: string;
    private readonly enabled: boolean;
    private readonly onWarning: (message: string) => void;
    private queue: Promise<void> = Promise.resolve();

    constructor(logPath: string, options: InteractionLoggerOptions = {}) {
        this.logPath = logPath;
        this.enabled = options.enabled ?? true;
        this.onWarning = options.onWarning ?? ((message) => console.warn(chalk.yellow(message)));
    }

    log(role: string, text: string): void {
        if (!text.trim()) {
            return;
        }
        this.enqueue({
            timestamp: new Date().toISOString(),
            role,
            text: redactSensitiveText(text)
        });
    }

    logEvent(event: string, data?: unknown): void {
        if (!event.trim()) {
            return;
        }
        this.enqueue({
            timestamp: new Date().toISOString(),
            type: 'event',
            event,
            data: redactValue(data ?? null)
        });
    }

    /**
     * Record an unexpected error with the host details needed to reproduce it
     */
    logError(error: Error, context?: Record<string, unknown>): void {
        this.logEvent('error', {
            error: {
                name: error.name,
                message: error.message,
                stack: error.stack
            },
            context,
            system: {
                platform: os.platform(),
                arch: os.arch(),
                release: os.release(),
                nodeVersion: process.version,
                cwd: process.cwd()
            }
        });
    }

    /**
     * Resolves once every queued entry has been written (or has failed)
     */
    flush(): Promise<void> {
        return this.queue;
    }

    async getRecentEntries(count: number = 10): Promise<InteractionLogEntry[]> {
        await this.flush();
        if (!(await fs.pathExists(this.logPath))) {
            return [];
        }
        const content = await fs.readFile(this.logPath, 'utf-8');
        const entries = content
            .split('\n')
            .filter((line) => line.trim())
            .map((line): InteractionLogEntry | null => {
                try {
                    return JSON.parse(line) as InteractionLogEntry;
                } catch {
                    return null;
                }
            })
            .filter((entry): entry is InteractionLogEntry => entry !== null);
        return entries.slice(-count);
    }

    private enqueue(entry: InteractionLogEntry): void {
        if (!this.enabled) {
            return;
        }
        this.queue = this.queue
            .then(() => this.write(entry))
            .catch((error: unknown) => {
                const message = error instanceof Error ? error.message : String(error);
                this.onWarning(`Warning: unable to write log: ${message}`);
            });
    }

    private async write(entry: InteractionLogEntry): Promise<void> {
        await fs.ensureDir(path.dirname(this.logPath));
        await fs.appendFile(this.logPath, JSON.stringify(entry) + '\n', 'utf-8');
    }
}
