/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 */
import chalk from 'chalk';
import type { RuntimeCommandContext, RuntimeSignal } from '../core/runtimeCommandTypes.js';

function statusText(enabled: boolean): string {
    return enabled ? 'ON' : 'OFF';
}

function setSafeMode(ctx: RuntimeCommandContext, enabled: boolean): void {
    ctx.settings.safeMode = enabled;
    const line = `Safe mode: ${statusText(enabled)}`;
    ctx.print(enabled ? chalk.green(line) : chalk.yellow(line));
    ctx.logger?.logEvent('safe_mode_changed', { enabled });
}

/**
 * Safe command - show or toggle confirmation of destructive commands
 */
export async function safe(ctx: RuntimeCommandContext, args: string[] = []): Promise<RuntimeSignal | null> {
    const [mode] = args;

    if (mode === 'on') {
        setSafeMode(ctx, true);
        return null;
    }

    if (mode === 'off') {
        const confirmed = await ctx.confirm('Disable safe mode? This can execute destructive commands.');
        if (confirmed) {
            setSafeMode(ctx, false);
        } else {
            ctx.print(chalk.yellow(`Safe mode stays ${statusText(ctx.settings.safeMode)}.`));
        }
        return null;
    }

    const line = `Safe mode is ${statusText(ctx.settings.safeMode)}`;
    ctx.print(ctx.settings.safeMode ? chalk.green(line) : chalk.yellow(line));
    return null;
}

export const metadata = {
    command: '/safe',
    description: 'show safe mode; `safe on` / `safe off` toggle it',
    implemented: true
};
