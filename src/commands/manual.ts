/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 */
import type { RuntimeSignal } from '../core/runtimeCommandTypes.js';

/**
 * Manual command - the session reads and runs one command typed by the operator
 */
export async function manual(): Promise<RuntimeSignal | null> {
    return '/manual';
}

export const metadata = {
    command: '/e',
    description: 'enter one command yourself and have the result analyzed',
    implemented: true
};
