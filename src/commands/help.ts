/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 */
import chalk from 'chalk';
import type { RuntimeCommand, RuntimeCommandContext, RuntimeSignal } from '../core/runtimeCommandTypes.js';

/**
 * Help command - shows available commands and tips
 */
export async function help(ctx: RuntimeCommandContext, commands: RuntimeCommand[]): Promise<RuntimeSignal | null> {
    ctx.print(chalk.cyan('\nAvailable commands:\n'));

    commands.forEach(({ command, description }) => {
        ctx.print(`  ${chalk.yellow(command.padEnd(10))} ${chalk.gray(description)}`);
    });

    ctx.print(chalk.cyan('\nTips:\n'));
    ctx.print(chalk.gray('  • Every command also works without the leading slash'));
    ctx.print(chalk.gray('  • Anything else you type is sent to the model as a request'));
    ctx.print(chalk.gray('  • Press Ctrl+C while a command runs to interrupt it\n'));

    return null;
}

export const metadata = {
    command: '/help',
    description: 'describe available commands',
    implemented: true
};
