/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 */
import chalk from 'chalk';
import type { RuntimeCommandContext, RuntimeSignal } from '../core/runtimeCommandTypes.js';

/**
 * Tokens command - show or toggle the per-exchange usage line
 */
export async function tokens(ctx: RuntimeCommandContext, args: string[] = []): Promise<RuntimeSignal | null> {
    const [mode] = args;
    if (mode === 'on' || mode === 'off') {
        ctx.settings.showTokens = mode === 'on';
        ctx.logger?.logEvent('token_usage_display_changed', { enabled: ctx.settings.showTokens });
    }

    const enabled = ctx.settings.showTokens;
    const line = `Token usage display: ${enabled ? 'ON' : 'OFF'}`;
    ctx.print(enabled ? chalk.green(line) : chalk.yellow(line));
    return null;
}

export const metadata = {
    command: '/tokens',
    description: 'show token usage display; `tokens on` / `tokens off` toggle it',
    implemented: true
};
