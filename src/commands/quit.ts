/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 */
import type { RuntimeSignal } from '../core/runtimeCommandTypes.js';

/**
 * Quit command - exits the application
 */
export async function quit(): Promise<RuntimeSignal | null> {
    return '/quit';
}

export const metadata = {
    command: '/quit',
    description: 'exit (also `q`)',
    implemented: true
};
